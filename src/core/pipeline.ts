import type { ProvisionContext } from './context.js';
import type { ExitHooks } from './collector.js';
import type { Reporter } from './ui.js';
import { armCompletionGuard } from './collector.js';
import { getErrorMessage, isFatalError } from './errors.js';
import { PROVISIONING_STEPS, validateStepOrder } from './steps.js';
import type { ProvisionStep, StepName } from './steps.js';

/**
 * Runs the declared steps once each, in order. Warnings are handed to the
 * collector; a thrown error stops the loop where it is.
 */
export async function runPipeline(
  ctx: ProvisionContext,
  steps: readonly ProvisionStep[] = PROVISIONING_STEPS,
): Promise<StepName[]> {
  validateStepOrder(steps);
  const ran: StepName[] = [];
  for (const step of steps) {
    if (step.mainProjectOnly && !ctx.mainProject) {
      ctx.reporter.debug(`Skipping ${step.title.toLowerCase()} (main project disabled)`);
      continue;
    }
    ctx.reporter.step(step.title);
    const warnings = await step.run(ctx);
    for (const warning of warnings) ctx.collector.warn(warning);
    ran.push(step.name);
  }
  return ran;
}

export type ProvisionOptions = { hooks?: ExitHooks; steps?: readonly ProvisionStep[] };

/** Whole run with end-of-run reporting; resolves with the process exit code. */
export async function runProvisioning(ctx: ProvisionContext, opts: ProvisionOptions = {}): Promise<number> {
  return provision(ctx.reporter, () => ctx, opts);
}

/**
 * Arms the completion guard, then builds the context with `setup` and runs
 * the pipeline. A failure while loading the manifest or resolving paths ends
 * the run the same way a failing step does.
 */
export async function provision(
  reporter: Reporter,
  setup: () => ProvisionContext | Promise<ProvisionContext>,
  opts: ProvisionOptions = {},
): Promise<number> {
  const guard = armCompletionGuard(reporter, opts.hooks);
  let ctx: ProvisionContext;
  try {
    ctx = await setup();
    await runPipeline(ctx, opts.steps);
  } catch (err) {
    reporter.error(`FATAL ERROR: ${getErrorMessage(err)}`);
    return isFatalError(err) ? err.exitCode : 1;
  }
  guard.disarm();
  ctx.collector.summary();
  return 0;
}
