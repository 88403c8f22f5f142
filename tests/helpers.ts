import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseManifest } from '../src/core/config.js';
import type { Manifest } from '../src/core/config.js';
import type { CommandRunner, Invocation } from '../src/core/collaborators.js';
import type { GitClient, GitVersion } from '../src/core/git.js';
import { resolveRoots } from '../src/core/paths.js';
import type { ResolvedRoots } from '../src/core/paths.js';
import type { Prompter, Reporter } from '../src/core/ui.js';
import type { CapabilityResult } from '../src/core/types.js';
import { createProvisionContext } from '../src/core/context.js';
import type { ProvisionContext } from '../src/core/context.js';
import type { ExitHooks } from '../src/core/collector.js';

export async function makeTempDir(prefix = 'devstrap-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
  }
}

export type ReportLine = { level: keyof Reporter; message: string };

export class RecordingReporter implements Reporter {
  readonly lines: ReportLine[] = [];

  private push(level: keyof Reporter, message: string): void {
    this.lines.push({ level, message });
  }

  intro(title: string): void { this.push('intro', title); }
  step(message: string): void { this.push('step', message); }
  info(message: string): void { this.push('info', message); }
  success(message: string): void { this.push('success', message); }
  warn(message: string): void { this.push('warn', message); }
  error(message: string): void { this.push('error', message); }
  debug(message: string): void { this.push('debug', message); }
  note(body: string, title: string): void { this.push('note', `${title}: ${body}`); }
  outro(message: string): void { this.push('outro', message); }

  messages(level: keyof Reporter): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private readonly answers: string[] = [], private readonly confirmAnswer = true) {}

  async text(message: string): Promise<string> {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unexpected prompt: ${message}`);
    return answer;
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return this.confirmAnswer;
  }
}

export class FakeGit implements GitClient {
  readonly globalConfig = new Map<string, string>();
  readonly localConfig = new Map<string, Map<string, string>>();
  readonly clones: { url: string; dest: string }[] = [];
  readonly configWrites: { key: string; value: string }[] = [];
  readonly cloneFailures = new Map<string, string>();
  installed: GitVersion = { installed: true, major: 2, minor: 43 };

  async version(): Promise<GitVersion> {
    return this.installed;
  }

  async getConfig(key: string): Promise<string | null> {
    return this.globalConfig.get(key) ?? null;
  }

  async getLocalConfig(dir: string, key: string): Promise<string | null> {
    return this.localConfig.get(path.resolve(dir))?.get(key) ?? null;
  }

  setLocal(dir: string, key: string, value: string): void {
    const resolved = path.resolve(dir);
    const config = this.localConfig.get(resolved) ?? new Map<string, string>();
    config.set(key, value);
    this.localConfig.set(resolved, config);
  }

  async setGlobalConfig(key: string, value: string): Promise<void> {
    this.configWrites.push({ key, value });
    this.globalConfig.set(key, value);
  }

  async clone(url: string, dest: string): Promise<void> {
    this.clones.push({ url, dest });
    const failure = this.cloneFailures.get(url);
    if (failure) throw new Error(failure);
    await fs.promises.mkdir(path.join(dest, '.git'), { recursive: true });
  }

  async updateSubmodules(): Promise<void> {}
}

/**
 * Runs nothing. The clone tool is simulated: a clone creates the checkout and
 * sets its local email; `--repair` sets the local email in its cwd.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: { invocation: Invocation; quiet: boolean }[] = [];
  readonly failures = new Map<string, string>();
  readonly effects = new Map<string, (invocation: Invocation) => void>();

  constructor(private readonly git: FakeGit, private readonly cloneToolBin: string) {}

  async run(invocation: Invocation, opts: { quiet?: boolean } = {}): Promise<CapabilityResult> {
    this.calls.push({ invocation, quiet: !!opts.quiet });
    const key = [invocation.command, ...invocation.args].join(' ');
    for (const [prefix, message] of this.failures) {
      if (key.startsWith(prefix)) return { ok: false, message };
    }
    for (const [prefix, effect] of this.effects) {
      if (key.startsWith(prefix)) effect(invocation);
    }
    if (invocation.command === this.cloneToolBin) this.simulateCloneTool(invocation);
    return { ok: true };
  }

  private simulateCloneTool(invocation: Invocation): void {
    const email = invocation.args.find((a) => a.startsWith('--email='))?.slice('--email='.length) ?? '';
    if (invocation.args[0] === '--repair') {
      this.git.setLocal(invocation.cwd, 'user.email', email);
      return;
    }
    const dest = invocation.args[1];
    if (!dest) return;
    fs.mkdirSync(path.join(dest, '.git'), { recursive: true });
    this.git.setLocal(dest, 'user.email', email);
  }

  commandLines(opts: { includeQuiet?: boolean } = {}): string[] {
    return this.calls
      .filter((c) => opts.includeQuiet || !c.quiet)
      .map((c) => [c.invocation.command, ...c.invocation.args].join(' '));
  }
}

export const DOTFILE_SOURCES: Record<string, string> = {
  '.bashrc.managed': 'export MANAGED=1\n',
  '.vim/ftplugin/python.vim': 'setlocal expandtab\n',
  'bashrc.default': '[ -f ~/.bashrc.managed ] && . ~/.bashrc.managed\n',
  'gitignore.template': '*.swp\n',
};

export function testManifest(overrides: Partial<Record<keyof Manifest, unknown>> = {}): Manifest {
  return parseManifest({
    organization: { name: 'Test Org', emailDomain: 'example.test' },
    paths: { repos: 'src', devtools: 'src/devtools' },
    cloneTool: { url: 'git@example.test:org/org-clone', bin: 'bin/org-clone' },
    devtools: ['git@example.test:org/org-clone', 'git@example.test:org/linter'],
    mainProject: { url: 'git@example.test:org/webapp', dumpFile: 'datastore/current.sqlite' },
    dotfiles: [
      { pattern: '.*.managed', mode: 'symlink' },
      { pattern: '.vim/ftplugin/*.vim', mode: 'symlink' },
      { pattern: '*.default', mode: 'copy-with-inclusion', marker: '.{name}.managed' },
      { pattern: '*.template', mode: 'copy-if-absent' },
    ],
    tools: [
      {
        name: 'yarn',
        probe: { command: 'yarn', args: ['--version'] },
        install: { command: 'npm', args: ['install', '-g', 'yarn'] },
      },
    ],
    commands: {
      cloudAuth: { command: 'cloud-auth', args: ['-r', '{home}'] },
      installDeps: { command: 'make', args: ['install_deps'], cwd: 'main-project' },
      installHooks: { command: 'make', args: ['hooks'], cwd: 'main-project' },
      fetchDump: { command: 'make', args: ['current.sqlite'], cwd: 'main-project' },
      createDatabases: { command: 'make', args: ['pg_create'], cwd: 'main-project' },
    },
    ...overrides,
  });
}

export type World = {
  home: string;
  dotfiles: string;
  manifest: Manifest;
  roots: ResolvedRoots;
  git: FakeGit;
  runner: FakeRunner;
  reporter: RecordingReporter;
  prompter: ScriptedPrompter;
  context(opts?: { mainProject?: boolean; shell?: string; prompter?: ScriptedPrompter; reporter?: RecordingReporter }): ProvisionContext;
};

export async function createWorld(manifest: Manifest = testManifest()): Promise<World> {
  const base = await makeTempDir();
  const home = path.join(base, 'home');
  const dotfiles = path.join(base, 'dotfiles');
  await writeFiles(dotfiles, DOTFILE_SOURCES);
  const roots = resolveRoots({ root: home, dotfilesDir: dotfiles, manifest });
  const git = new FakeGit();
  const runner = new FakeRunner(git, roots.cloneToolBin);
  const reporter = new RecordingReporter();
  const prompter = new ScriptedPrompter();
  return {
    home,
    dotfiles,
    manifest,
    roots,
    git,
    runner,
    reporter,
    prompter,
    context(opts = {}) {
      return createProvisionContext({
        manifest,
        roots,
        mainProject: opts.mainProject ?? true,
        env: { shell: opts.shell ?? '/bin/bash', user: 'tester' },
        reporter: opts.reporter ?? reporter,
        prompter: opts.prompter ?? prompter,
        git,
        runner,
      });
    },
  };
}

/** Every path under `root` with its kind and content (or link target), for before/after comparison. */
export async function snapshotTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  async function walk(dir: string): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      const rel = path.relative(root, full);
      if (entry.isSymbolicLink()) out[rel] = `link:${await fs.promises.readlink(full)}`;
      else if (entry.isDirectory()) {
        out[rel] = 'dir';
        await walk(full);
      } else out[rel] = `file:${await fs.promises.readFile(full, 'utf8')}`;
    }
  }
  await walk(root);
  return out;
}

/** Exit hooks that never touch the real process. */
export function fakeExitHooks() {
  const exitListeners = new Set<() => void>();
  const signalListeners = new Map<NodeJS.Signals, () => void>();
  const exits: number[] = [];
  const hooks: ExitHooks = {
    onExit(listener) {
      exitListeners.add(listener);
      return () => exitListeners.delete(listener);
    },
    onSignal(signal, listener) {
      signalListeners.set(signal, listener);
      return () => signalListeners.delete(signal);
    },
    exit(code) {
      exits.push(code);
      for (const listener of [...exitListeners]) listener();
    },
  };
  return {
    hooks,
    exits,
    exitListeners,
    signalListeners,
    fireExit: () => {
      for (const listener of [...exitListeners]) listener();
    },
  };
}
