import os from 'os';
import path from 'path';
import type { Manifest } from './config.js';

export type RootOptions = {
  root?: string;
  dotfilesDir?: string;
  manifest: Manifest;
};

export type ResolvedRoots = {
  homeDir: string;
  reposDir: string;
  devtoolsDir: string;
  dotfilesDir: string;
  cloneToolDir: string;
  cloneToolBin: string;
  mainProjectDir: string;
};

/** Directory a clone of `url` lands in: `git@host:org/tools.git` -> `tools`. */
export function repoDirName(url: string): string {
  const trimmed = url.replace(/\/+$/, '').replace(/\.git$/, '');
  const last = trimmed.split(/[/:]/).pop();
  if (!last) throw new Error(`Cannot derive a directory name from ${url}`);
  return last;
}

export function resolveRoots(opts: RootOptions): ResolvedRoots {
  const homeDir = path.resolve(opts.root || os.homedir());
  const reposDir = path.join(homeDir, opts.manifest.paths.repos);
  const devtoolsDir = path.join(homeDir, opts.manifest.paths.devtools);
  const cloneToolDir = path.join(devtoolsDir, repoDirName(opts.manifest.cloneTool.url));
  return {
    homeDir,
    reposDir,
    devtoolsDir,
    dotfilesDir: path.resolve(opts.dotfilesDir || process.cwd()),
    cloneToolDir,
    cloneToolBin: path.join(cloneToolDir, opts.manifest.cloneTool.bin),
    mainProjectDir: path.join(reposDir, repoDirName(opts.manifest.mainProject.url)),
  };
}

/** True when `target` sits strictly inside `root`. */
export function isInside(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}
