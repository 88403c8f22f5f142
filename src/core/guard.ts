import fs from 'fs';
import path from 'path';
import type { CapabilityResult, DotfileMapping, DotfileTask } from './types.js';
import { fileContains, pathExists, readLinkAbsolute } from '../utils/fs.js';

/**
 * Per-resource "does this need doing?" decisions. Nothing in here mutates
 * state; callers act on the returned decision.
 */

export async function inspectSymlink(source: string, target: string): Promise<DotfileTask> {
  if (!await pathExists(target)) return { type: 'link', source, target };
  const stat = await fs.promises.lstat(target);
  if (stat.isSymbolicLink()) {
    const resolved = await readLinkAbsolute(target);
    if (resolved && path.resolve(resolved) === path.resolve(source)) {
      return { type: 'noop', source, target };
    }
    const reason = resolved ? `Symlink points elsewhere: ${resolved}` : 'Symlink points elsewhere';
    return { type: 'conflict', source, target, reason };
  }
  const targetKind = stat.isDirectory() ? 'directory' : stat.isFile() ? 'file' : 'path';
  return { type: 'conflict', source, target, reason: `Target exists and is not a symlink (${targetKind})` };
}

export async function inspectRequiredInclusion(source: string, target: string, marker: string): Promise<DotfileTask> {
  if (!await pathExists(target)) return { type: 'copy', source, target, mode: 'copy-with-inclusion' };
  const stat = await fs.promises.stat(target).catch(() => null);
  if (!stat?.isFile()) return { type: 'fatal', source, target, marker };
  if (await fileContains(target, marker)) return { type: 'noop', source, target };
  return { type: 'fatal', source, target, marker };
}

export async function inspectCopyIfAbsent(source: string, target: string): Promise<DotfileTask> {
  if (await pathExists(target)) return { type: 'noop', source, target };
  return { type: 'copy', source, target, mode: 'copy-if-absent' };
}

export async function inspectDotfile(mapping: DotfileMapping): Promise<DotfileTask> {
  switch (mapping.mode) {
    case 'symlink':
      return inspectSymlink(mapping.source, mapping.target);
    case 'copy-with-inclusion':
      if (!mapping.marker) throw new Error(`Mapping ${mapping.name} has no marker token`);
      return inspectRequiredInclusion(mapping.source, mapping.target, mapping.marker);
    case 'copy-if-absent':
      return inspectCopyIfAbsent(mapping.source, mapping.target);
  }
}

export type RepositoryDecision =
  | { type: 'clone' }
  | { type: 'noop' }
  | { type: 'conflict'; reason: string };

export async function inspectRepository(dest: string): Promise<RepositoryDecision> {
  if (!await pathExists(dest)) return { type: 'clone' };
  const stat = await fs.promises.stat(dest).catch(() => null);
  if (stat?.isDirectory()) return { type: 'noop' };
  return { type: 'conflict', reason: `${dest} exists and is not a directory` };
}

export type ToolDecision = { type: 'present' } | { type: 'install'; reason: string };

export async function probeTool(probe: () => Promise<CapabilityResult>): Promise<ToolDecision> {
  const result = await probe();
  if (result.ok) return { type: 'present' };
  return { type: 'install', reason: result.message };
}
