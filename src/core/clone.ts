import path from 'path';
import type { Manifest } from './config.js';
import type { CommandRunner } from './collaborators.js';
import type { GitClient } from './git.js';
import type { IdentityResolver } from './identity.js';
import type { ResolvedRoots } from './paths.js';
import { repoDirName } from './paths.js';
import type { RepositorySpec } from './types.js';
import { inspectRepository } from './guard.js';
import { FatalError, getErrorMessage } from './errors.js';
import { ensureDir, pathExists } from '../utils/fs.js';

export type CloneFailureKind = 'access-denied' | 'not-found' | 'other';

export type CloneOutcome =
  | { status: 'cloned'; spec: RepositorySpec }
  | { status: 'present'; spec: RepositorySpec }
  | { status: 'failed'; spec: RepositorySpec; kind: CloneFailureKind; message: string };

const ACCESS_DENIED = [
  /permission denied/i,
  /access denied/i,
  /authentication failed/i,
  /could not read username/i,
  /\b403\b/,
];
const NOT_FOUND = [/not found/i, /does not exist/i, /\b404\b/, /does not appear to be a git repository/i];
const UNREADABLE_REMOTE = /could not read from remote repository/i;

/**
 * Hosts answer "not found" for private repositories the caller cannot see, so
 * for a repository that needs authentication that answer means access denied.
 */
export function classifyCloneFailure(message: string, opts: { requiresAuth?: boolean } = {}): CloneFailureKind {
  if (ACCESS_DENIED.some((re) => re.test(message))) return 'access-denied';
  const notFound = NOT_FOUND.some((re) => re.test(message));
  if (opts.requiresAuth && (notFound || UNREADABLE_REMOTE.test(message))) return 'access-denied';
  return notFound ? 'not-found' : 'other';
}

export function cloneFailureMessage(outcome: Extract<CloneOutcome, { status: 'failed' }>): string {
  const { url } = outcome.spec;
  switch (outcome.kind) {
    case 'access-denied':
      return `Unable to clone ${url}: access denied. Check that you have been granted access to this repository, then re-run.`;
    case 'not-found':
      return `Unable to clone ${url}: repository not found. Check the URL in the manifest.`;
    case 'other':
      return `Unable to clone ${url}: ${outcome.message}`;
  }
}

/** Clone tool first, then every devtool, then (optionally) the main project. */
export function buildRepositorySpecs(manifest: Manifest, roots: ResolvedRoots, mainProject: boolean): RepositorySpec[] {
  const specs: RepositorySpec[] = [
    {
      url: manifest.cloneTool.url,
      dest: roots.cloneToolDir,
      mode: 'bootstrap',
      mandatory: true,
      requiresAuth: false,
      protectedHooks: false,
    },
  ];
  for (const url of manifest.devtools) {
    if (url === manifest.cloneTool.url) continue;
    specs.push({
      url,
      dest: path.join(roots.devtoolsDir, repoDirName(url)),
      mode: 'identity',
      mandatory: false,
      requiresAuth: false,
      protectedHooks: false,
    });
  }
  if (mainProject) {
    specs.push({
      url: manifest.mainProject.url,
      dest: roots.mainProjectDir,
      mode: 'identity',
      mandatory: true,
      requiresAuth: true,
      protectedHooks: true,
    });
  }
  return specs;
}

export type ClonerOptions = {
  git: GitClient;
  runner: CommandRunner;
  identity: IdentityResolver;
  cloneToolBin: string;
};

export class RepositoryCloner {
  constructor(private readonly opts: ClonerOptions) {}

  /** Ensures the repository exists locally. Never clones over an existing destination. */
  async ensure(spec: RepositorySpec): Promise<CloneOutcome> {
    const decision = await inspectRepository(spec.dest);
    if (decision.type === 'noop') return { status: 'present', spec };
    if (decision.type === 'conflict') {
      return { status: 'failed', spec, kind: 'other', message: decision.reason };
    }

    await ensureDir(path.dirname(spec.dest));
    const failure = spec.mode === 'bootstrap'
      ? await this.bootstrapClone(spec)
      : await this.identityClone(spec);
    if (failure === null) return { status: 'cloned', spec };
    return { status: 'failed', spec, kind: classifyCloneFailure(failure, spec), message: failure };
  }

  /** Plain clone plus submodules; only used to obtain the clone tool itself. */
  private async bootstrapClone(spec: RepositorySpec): Promise<string | null> {
    try {
      await this.opts.git.clone(spec.url, spec.dest);
      await this.opts.git.updateSubmodules(spec.dest);
      return null;
    } catch (err) {
      return getErrorMessage(err);
    }
  }

  private async identityClone(spec: RepositorySpec): Promise<string | null> {
    const identity = await this.opts.identity.resolve();
    const args = [spec.url, spec.dest, `--name=${identity.name}`, `--email=${identity.email}`];
    if (spec.protectedHooks) args.push('-p');
    const result = await this.opts.runner.run({
      command: this.opts.cloneToolBin,
      args,
      cwd: path.dirname(spec.dest),
    });
    return result.ok ? null : result.message;
  }

  /**
   * Re-runs the clone tool over a checkout that was cloned without it, so its
   * local config carries the identity like every other clone. A checkout whose
   * local email already matches is left alone.
   */
  async repair(dir: string): Promise<'repaired' | 'current' | 'not-a-checkout'> {
    if (!await pathExists(path.join(dir, '.git'))) return 'not-a-checkout';
    const identity = await this.opts.identity.resolve();
    const localEmail = await this.opts.git.getLocalConfig(dir, 'user.email');
    if (localEmail === identity.email) return 'current';

    const result = await this.opts.runner.run({
      command: this.opts.cloneToolBin,
      args: ['--repair', '--quiet', `--email=${identity.email}`],
      cwd: dir,
    });
    if (!result.ok) throw new FatalError(`Unable to repair ${dir}: ${result.message}`);
    return 'repaired';
  }
}
