#!/usr/bin/env node
import path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { note, outro } from '@clack/prompts';
import { loadManifest, MAIN_PROJECT_ENV, MANIFEST_FILE, parseToggle, readProvisionEnv } from './core/config.js';
import { resolveRoots } from './core/paths.js';
import { createProvisionContext } from './core/context.js';
import { provision } from './core/pipeline.js';
import { createGitClient } from './core/git.js';
import { createProcessRunner } from './core/collaborators.js';
import { createClackPrompter, createConsoleReporter } from './core/ui.js';
import { getDotfileStatus } from './core/plan.js';
import { formatServiceLine, getServiceStatus } from './core/status.js';
import { getErrorMessage } from './core/errors.js';
import type { DotfileStatus } from './core/types.js';

const appTitle = 'devstrap';

type CommonOptions = {
  manifest?: string;
  dotfiles?: string;
  verbose?: boolean;
};

type InstallOptions = CommonOptions & { mainProject: boolean };

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural || `${singular}s`);
}

function formatCount(count: number, singular: string, plural?: string): string {
  return `${count} ${pluralize(count, singular, plural)}`;
}

function renderDotfileLines(status: DotfileStatus[]): string[] {
  return status.map((entry) => {
    const icon = entry.status === 'installed'
      ? chalk.green('✓')
      : entry.status === 'missing'
        ? chalk.yellow('•')
        : chalk.red('⚠');
    const detail = entry.status === 'conflict' || entry.status === 'incompatible' ? chalk.dim(` (${entry.status})`) : '';
    return `  ${icon} ${entry.target}${detail}`;
  });
}

async function loadSetup(root: string | undefined, opts: CommonOptions) {
  const dotfilesDir = path.resolve(opts.dotfiles || process.cwd());
  const manifest = await loadManifest(path.resolve(opts.manifest || path.join(dotfilesDir, MANIFEST_FILE)));
  return { manifest, roots: resolveRoots({ root, dotfilesDir, manifest }) };
}

async function runInstall(root: string | undefined, opts: InstallOptions): Promise<number> {
  const reporter = createConsoleReporter({ verbose: opts.verbose });
  reporter.intro(appTitle);
  return provision(reporter, async () => {
    const { manifest, roots } = await loadSetup(root, opts);
    // The flag can only turn the main project off; the environment decides otherwise.
    const mainProject = opts.mainProject && parseToggle(process.env[MAIN_PROJECT_ENV]);
    return createProvisionContext({
      manifest,
      roots,
      mainProject,
      env: readProvisionEnv(process.env),
      reporter,
      prompter: createClackPrompter(),
      git: createGitClient(),
      runner: createProcessRunner(),
    });
  });
}

async function runStatus(root: string | undefined, opts: CommonOptions): Promise<number> {
  const { manifest, roots } = await loadSetup(root, opts);
  const dotfiles = await getDotfileStatus({ rules: manifest.dotfiles, dotfilesDir: roots.dotfilesDir, homeDir: roots.homeDir });
  const installed = dotfiles.filter((d) => d.status === 'installed').length;
  note(
    [`${formatCount(installed, 'dotfile')} of ${dotfiles.length} installed`, ...renderDotfileLines(dotfiles)].join('\n'),
    `Dotfiles · ${roots.homeDir}`,
  );
  const services = await getServiceStatus(manifest.services);
  if (services.length > 0) {
    note(services.map(formatServiceLine).join('\n'), 'Services');
  }
  outro('Bye');
  return 0;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-m, --manifest <file>', `provisioning manifest (default: <dotfiles>/${MANIFEST_FILE})`)
    .option('-d, --dotfiles <dir>', 'dotfiles checkout to install from (default: current directory)')
    .option('-v, --verbose', 'show skipped work');
}

const program = new Command();
program.name(appTitle).description('Provision a developer workstation');

withCommonOptions(
  program
    .command('install', { isDefault: true })
    .description('Install dotfiles, clone repositories and set up tooling (safe to re-run)')
    .argument('[root]', 'directory to provision (default: your home directory)')
    .option('--no-main-project', `skip the main project end to end (also ${MAIN_PROJECT_ENV}=false)`),
).action(async (root: string | undefined, opts: InstallOptions) => {
  process.exitCode = await runInstall(root, opts);
});

withCommonOptions(
  program
    .command('status')
    .description('Show dotfile and dev service status')
    .argument('[root]', 'provisioned directory (default: your home directory)'),
).action(async (root: string | undefined, opts: CommonOptions) => {
  process.exitCode = await runStatus(root, opts);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`${chalk.red(`FATAL ERROR: ${getErrorMessage(err)}`)}\n`);
  process.exit(1);
});
