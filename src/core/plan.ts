import { getMappings } from './mappings.js';
import type { MappingOptions } from './mappings.js';
import { inspectDotfile } from './guard.js';
import type { ConflictTask, DotfileMapping, DotfilePlan, DotfileStatus, DotfileTask, FatalTask } from './types.js';

export async function buildPlanFromMappings(mappings: DotfileMapping[]): Promise<DotfilePlan> {
  const tasks: DotfileTask[] = [];
  for (const mapping of mappings) {
    tasks.push(await inspectDotfile(mapping));
  }

  const conflicts = tasks.filter((t): t is ConflictTask => t.type === 'conflict');
  const fatals = tasks.filter((t): t is FatalTask => t.type === 'fatal');
  const changes = tasks.filter((t) => t.type === 'link' || t.type === 'copy');

  return { tasks, conflicts, fatals, changes };
}

export async function buildDotfilePlan(opts: MappingOptions): Promise<DotfilePlan> {
  return buildPlanFromMappings(await getMappings(opts));
}

export async function getDotfileStatus(opts: MappingOptions): Promise<DotfileStatus[]> {
  const mappings = await getMappings(opts);
  const plan = await buildPlanFromMappings(mappings);
  return mappings.map((mapping, i) => {
    const task = plan.tasks[i];
    const status: DotfileStatus['status'] = task.type === 'noop'
      ? 'installed'
      : task.type === 'conflict'
        ? 'conflict'
        : task.type === 'fatal'
          ? 'incompatible'
          : 'missing';
    return { name: mapping.name, target: mapping.target, status };
  });
}
