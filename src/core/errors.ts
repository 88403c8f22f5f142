/**
 * Terminal condition for a provisioning run. Anything thrown as a FatalError
 * halts the pipeline at once; warnings go through the collector instead.
 */
export class FatalError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'FatalError';
    this.exitCode = exitCode;
  }
}

export function isFatalError(err: unknown): err is FatalError {
  return err instanceof FatalError;
}

/** Message of an unknown thrown value, for `catch (err: unknown)` sites. */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string' && err.length > 0) return err;
  return 'Unknown error';
}
