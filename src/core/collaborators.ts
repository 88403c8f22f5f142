import { spawn } from 'child_process';
import path from 'path';
import type { CommandSpec } from './config.js';
import type { ResolvedRoots } from './paths.js';
import type { CapabilityResult } from './types.js';
import { FatalError } from './errors.js';

export type Invocation = {
  command: string;
  args: string[];
  cwd: string;
};

/**
 * Uniform contract for every external collaborator: installers, probes, the
 * clone tool, the downstream build system. Blocks until the process exits.
 */
export interface CommandRunner {
  run(invocation: Invocation, opts?: { quiet?: boolean }): Promise<CapabilityResult>;
}

const MAX_STDERR_CHARS = 4_000;

export function createProcessRunner(): CommandRunner {
  return {
    run(invocation, opts = {}) {
      return new Promise<CapabilityResult>((resolve) => {
        let stderr = '';
        const child = spawn(invocation.command, invocation.args, {
          cwd: invocation.cwd,
          stdio: ['inherit', opts.quiet ? 'ignore' : 'inherit', 'pipe'],
        });
        child.stderr?.on('data', (chunk: Buffer) => {
          const text = chunk.toString();
          if (!opts.quiet) process.stderr.write(text);
          stderr = (stderr + text).slice(-MAX_STDERR_CHARS);
        });
        child.on('error', (err) => {
          resolve({ ok: false, message: `${invocation.command}: ${err.message}` });
        });
        child.on('close', (code, signal) => {
          if (code === 0) {
            resolve({ ok: true });
            return;
          }
          const status = signal ? `killed by ${signal}` : `exited with code ${code}`;
          const detail = stderr.trim();
          resolve({ ok: false, message: detail ? `${status}: ${detail}` : status });
        });
      });
    },
  };
}

function cwdFor(spec: CommandSpec, roots: ResolvedRoots): string {
  switch (spec.cwd) {
    case 'home':
      return roots.homeDir;
    case 'devtools':
      return roots.devtoolsDir;
    case 'dotfiles':
      return roots.dotfilesDir;
    case 'main-project':
      return roots.mainProjectDir;
  }
}

/** `{home}`, `{repos}`, `{devtools}` and `{dotfiles}` in a command or its args become absolute paths. */
export function resolveInvocation(spec: CommandSpec, roots: ResolvedRoots): Invocation {
  const vars: Record<string, string | undefined> = {
    home: roots.homeDir,
    repos: roots.reposDir,
    devtools: roots.devtoolsDir,
    dotfiles: roots.dotfilesDir,
  };
  const expand = (value: string) => value.replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
  const command = expand(spec.command);
  return {
    command: command.includes('/') ? path.resolve(cwdFor(spec, roots), command) : command,
    args: spec.args.map(expand),
    cwd: cwdFor(spec, roots),
  };
}

export function requireSuccess(result: CapabilityResult, what: string): void {
  if (!result.ok) throw new FatalError(`${what} failed: ${result.message}`);
}
