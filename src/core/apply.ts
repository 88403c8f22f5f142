import fs from 'fs';
import path from 'path';
import type { DotfilePlan, FatalTask } from './types.js';
import { FatalError } from './errors.js';
import { copyFileExclusive, ensureDir } from '../utils/fs.js';

export type ApplyResult = {
  linked: number;
  copied: number;
  skipped: number;
  conflicts: number;
  warnings: string[];
};

function incompatibleMessage(task: FatalTask): string {
  return `${task.target} does not 'include' ${task.marker}; see ${task.source} and add its contents to ${task.target}`;
}

async function createLink(source: string, target: string): Promise<void> {
  // Relative, so the link survives the home directory being moved or mounted elsewhere.
  const relativeSource = path.relative(path.dirname(target), source);
  await ensureDir(path.dirname(target));
  await fs.promises.symlink(relativeSource, target, 'file');
}

async function createCopy(source: string, target: string): Promise<void> {
  await ensureDir(path.dirname(target));
  await copyFileExclusive(source, target);
}

/**
 * Applies a dotfile plan. An incompatible managed file aborts before anything
 * is written; conflicts are left untouched and reported as warnings.
 */
export async function applyDotfilePlan(plan: DotfilePlan): Promise<ApplyResult> {
  const firstFatal = plan.fatals[0];
  if (firstFatal) throw new FatalError(incompatibleMessage(firstFatal));

  const result: ApplyResult = { linked: 0, copied: 0, skipped: 0, conflicts: 0, warnings: [] };

  for (const task of plan.tasks) {
    switch (task.type) {
      case 'noop':
        result.skipped += 1;
        break;
      case 'conflict':
        result.conflicts += 1;
        result.warnings.push(`Not symlinking to ${task.target} because it already exists.`);
        break;
      case 'link':
        await createLink(task.source, task.target);
        result.linked += 1;
        break;
      case 'copy':
        await createCopy(task.source, task.target);
        result.copied += 1;
        break;
      case 'fatal':
        throw new FatalError(incompatibleMessage(task));
    }
  }

  return result;
}
