import path from 'path';
import type { ProvisionContext } from './context.js';
import type { ProvisionEnv } from './config.js';
import { requireSuccess, resolveInvocation } from './collaborators.js';
import { buildRepositorySpecs, cloneFailureMessage } from './clone.js';
import { buildDotfilePlan } from './plan.js';
import { applyDotfilePlan } from './apply.js';
import { probeTool } from './guard.js';
import { meetsMinimumVersion } from './git.js';
import { FatalError } from './errors.js';
import { ensureDir, pathExists } from '../utils/fs.js';

export type StepName =
  | 'check-dependencies'
  | 'identity'
  | 'dotfiles'
  | 'clone'
  | 'cloud-auth'
  | 'install-deps'
  | 'hooks'
  | 'auth-tool'
  | 'data-dump'
  | 'databases';

export type ProvisionStep = {
  name: StepName;
  title: string;
  /** Steps that must already have run. */
  after: StepName[];
  /** Part of the main-project path; skipped silently when that path is off. */
  mainProjectOnly?: boolean;
  /** Resolves with warnings; throws FatalError to abort the run. */
  run(ctx: ProvisionContext): Promise<string[]>;
};

export const MIN_GIT_VERSION = { major: 1, minor: 8 };
const SUPPORTED_SHELLS = new Set(['bash', 'zsh']);

export function checkShell(env: ProvisionEnv): string | null {
  if (!env.shell || env.virtualEnv) return null;
  const shell = path.basename(env.shell);
  if (SUPPORTED_SHELLS.has(shell)) return null;
  return `Your default shell is ${shell}, not bash or zsh, so its config will not pick up the managed dotfiles; source them from it manually.`;
}

async function checkDependencies(ctx: ProvisionContext): Promise<string[]> {
  await ensureDir(ctx.roots.homeDir);
  const version = await ctx.git.version();
  if (!meetsMinimumVersion(version, MIN_GIT_VERSION)) {
    throw new FatalError(`Must have git >= ${MIN_GIT_VERSION.major}.${MIN_GIT_VERSION.minor}. See https://git-scm.com/downloads`);
  }
  const npm = await ctx.runner.run({ command: 'npm', args: ['--version'], cwd: ctx.roots.homeDir }, { quiet: true });
  if (!npm.ok) {
    throw new FatalError('You must install node and npm before running devstrap');
  }
  return [];
}

async function resolveIdentity(ctx: ProvisionContext): Promise<string[]> {
  const identity = await ctx.identity.resolve();
  ctx.reporter.info(`Using git identity ${identity.name} <${identity.email}>`);
  return [];
}

async function installDotfiles(ctx: ProvisionContext): Promise<string[]> {
  const plan = await buildDotfilePlan({
    rules: ctx.manifest.dotfiles,
    dotfilesDir: ctx.roots.dotfilesDir,
    homeDir: ctx.roots.homeDir,
  });
  const result = await applyDotfilePlan(plan);
  ctx.reporter.info(
    `Linked ${result.linked} · Copied ${result.copied} · Unchanged ${result.skipped} · Conflicts ${result.conflicts}`,
  );
  const shellWarning = checkShell(ctx.env);
  return shellWarning ? [...result.warnings, shellWarning] : result.warnings;
}

async function cloneRepositories(ctx: ProvisionContext): Promise<string[]> {
  const warnings: string[] = [];
  for (const spec of buildRepositorySpecs(ctx.manifest, ctx.roots, ctx.mainProject)) {
    const outcome = await ctx.cloner.ensure(spec);
    if (outcome.status === 'failed') {
      if (spec.mandatory) throw new FatalError(cloneFailureMessage(outcome));
      warnings.push(cloneFailureMessage(outcome));
      continue;
    }
    if (outcome.status === 'cloned') ctx.reporter.info(`Cloned ${spec.url}`);
    else ctx.reporter.debug(`${spec.dest} already exists`);

    // Fresh identity clones already carry the identity; anything else may not.
    const mayNeedRepair = spec.mode === 'bootstrap' || outcome.status === 'present';
    if (mayNeedRepair && await ctx.cloner.repair(spec.dest) === 'repaired') {
      ctx.reporter.info(`Repaired ${spec.dest}`);
    }
  }
  if (await ctx.cloner.repair(ctx.roots.dotfilesDir) === 'repaired') {
    ctx.reporter.info(`Repaired ${ctx.roots.dotfilesDir}`);
  }
  return warnings;
}

async function setupCloudAuth(ctx: ProvisionContext): Promise<string[]> {
  const spec = ctx.manifest.commands.cloudAuth;
  if (!spec) return [];
  requireSuccess(await ctx.runner.run(resolveInvocation(spec, ctx.roots)), 'Cloud authentication setup');
  return [];
}

async function installDependencies(ctx: ProvisionContext): Promise<string[]> {
  for (const tool of ctx.manifest.tools) {
    const decision = await probeTool(() => ctx.runner.run(resolveInvocation(tool.probe, ctx.roots), { quiet: true }));
    if (decision.type === 'present') {
      ctx.reporter.debug(`${tool.name} already installed`);
      continue;
    }
    ctx.reporter.info(`Installing ${tool.name}`);
    requireSuccess(await ctx.runner.run(resolveInvocation(tool.install, ctx.roots)), `Installing ${tool.name}`);
  }

  const spec = ctx.manifest.commands.installDeps;
  if (ctx.mainProject && spec) {
    ctx.reporter.info('Installing main project dependencies');
    requireSuccess(await ctx.runner.run(resolveInvocation(spec, ctx.roots)), 'Installing dependencies');
  }
  return [];
}

async function installHooks(ctx: ProvisionContext): Promise<string[]> {
  const spec = ctx.manifest.commands.installHooks;
  if (!spec) return [];
  requireSuccess(await ctx.runner.run(resolveInvocation(spec, ctx.roots)), 'Installing git hooks');
  return [];
}

async function setupAuthTool(ctx: ProvisionContext): Promise<string[]> {
  const authTool = ctx.manifest.authTool;
  if (!authTool) return [];
  const credentialFile = path.join(ctx.roots.homeDir, authTool.credentialFile);
  if (await pathExists(credentialFile)) {
    ctx.reporter.debug(`${credentialFile} already exists`);
    return [];
  }

  ctx.reporter.note(
    [
      'Make sure you are logged in and your account is set up:',
      `  -->  ${authTool.loginUrl}  <--`,
    ].join('\n'),
    'Auth tool setup',
  );
  const ready = await ctx.prompter.confirm('Are you logged in?');
  if (!ready) {
    return [`Skipped auth tool setup; re-run once you can log in at ${authTool.loginUrl}`];
  }
  requireSuccess(await ctx.runner.run(resolveInvocation(authTool.install, ctx.roots)), 'Auth tool setup');
  return [];
}

async function downloadDataDump(ctx: ProvisionContext): Promise<string[]> {
  const spec = ctx.manifest.commands.fetchDump;
  if (!spec) return [];
  const dumpFile = ctx.manifest.mainProject.dumpFile;
  if (dumpFile && await pathExists(path.join(ctx.roots.mainProjectDir, dumpFile))) {
    ctx.reporter.debug(`${dumpFile} already downloaded`);
    return [];
  }
  ctx.reporter.info('Downloading a recent data dump');
  requireSuccess(await ctx.runner.run(resolveInvocation(spec, ctx.roots)), 'Downloading the data dump');
  return [];
}

async function createDatabases(ctx: ProvisionContext): Promise<string[]> {
  const spec = ctx.manifest.commands.createDatabases;
  if (!spec) return [];
  requireSuccess(await ctx.runner.run(resolveInvocation(spec, ctx.roots)), 'Creating databases');
  return [];
}

export const PROVISIONING_STEPS: readonly ProvisionStep[] = [
  { name: 'check-dependencies', title: 'Checking system dependencies', after: [], run: checkDependencies },
  { name: 'identity', title: 'Updating your git user info', after: ['check-dependencies'], run: resolveIdentity },
  { name: 'dotfiles', title: 'Installing and updating dotfiles', after: ['check-dependencies'], run: installDotfiles },
  // Clones embed the identity.
  { name: 'clone', title: 'Cloning repositories', after: ['identity', 'dotfiles'], run: cloneRepositories },
  { name: 'cloud-auth', title: 'Setting up cloud authentication', after: ['clone'], run: setupCloudAuth },
  // Dependency install may probe for cloud tooling.
  { name: 'install-deps', title: 'Installing dependencies', after: ['clone', 'cloud-auth'], run: installDependencies },
  { name: 'hooks', title: 'Installing git hooks', after: ['install-deps'], mainProjectOnly: true, run: installHooks },
  { name: 'auth-tool', title: 'Setting up the auth tool', after: ['install-deps'], run: setupAuthTool },
  { name: 'data-dump', title: 'Downloading the data dump', after: ['install-deps'], mainProjectOnly: true, run: downloadDataDump },
  { name: 'databases', title: 'Creating databases', after: ['install-deps'], mainProjectOnly: true, run: createDatabases },
];

export function validateStepOrder(steps: readonly ProvisionStep[]): void {
  const seen = new Set<StepName>();
  for (const step of steps) {
    if (seen.has(step.name)) throw new Error(`Step ${step.name} is declared twice`);
    const missing = step.after.filter((dep) => !seen.has(dep));
    if (missing.length > 0) {
      throw new Error(`Step ${step.name} must run after ${missing.join(', ')}`);
    }
    seen.add(step.name);
  }
}
