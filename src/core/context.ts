import type { Manifest, ProvisionEnv } from './config.js';
import type { CommandRunner } from './collaborators.js';
import type { GitClient } from './git.js';
import type { ResolvedRoots } from './paths.js';
import type { Prompter, Reporter } from './ui.js';
import { WarningCollector } from './collector.js';
import { IdentityResolver } from './identity.js';
import { RepositoryCloner } from './clone.js';

/** Everything a run needs, resolved once at startup and threaded through every step. */
export type ProvisionContext = {
  readonly manifest: Manifest;
  readonly roots: ResolvedRoots;
  readonly mainProject: boolean;
  readonly env: ProvisionEnv;
  readonly reporter: Reporter;
  readonly prompter: Prompter;
  readonly git: GitClient;
  readonly runner: CommandRunner;
  readonly collector: WarningCollector;
  readonly identity: IdentityResolver;
  readonly cloner: RepositoryCloner;
};

export type ContextOptions = {
  manifest: Manifest;
  roots: ResolvedRoots;
  mainProject: boolean;
  env: ProvisionEnv;
  reporter: Reporter;
  prompter: Prompter;
  git: GitClient;
  runner: CommandRunner;
};

export function createProvisionContext(opts: ContextOptions): ProvisionContext {
  const identity = new IdentityResolver({
    git: opts.git,
    prompter: opts.prompter,
    reporter: opts.reporter,
    emailKey: opts.manifest.identity.emailKey,
    emailDomain: opts.manifest.organization.emailDomain,
    user: opts.env.user,
  });
  return {
    ...opts,
    collector: new WarningCollector(opts.reporter),
    identity,
    cloner: new RepositoryCloner({
      git: opts.git,
      runner: opts.runner,
      identity,
      cloneToolBin: opts.roots.cloneToolBin,
    }),
  };
}
