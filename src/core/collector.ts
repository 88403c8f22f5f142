import type { Reporter } from './ui.js';

export const COMPLETION_MARKER = 'DONE!';
export const SUMMARY_RULE = '-'.repeat(69);
export const INCOMPLETE_NOTICE =
  'Provisioning did not finish. Whatever ran has been applied; fix the problem above and re-run, it will pick up where it left off.';

/** Ordered, append-only log of non-fatal conditions, echoed as they arrive and again at the end. */
export class WarningCollector {
  private readonly entries: string[] = [];

  constructor(private readonly reporter: Reporter) {}

  warn(message: string): void {
    this.entries.push(message);
    this.reporter.warn(`WARNING: ${message}`);
  }

  get warnings(): readonly string[] {
    return this.entries;
  }

  summary(): void {
    this.reporter.info(SUMMARY_RULE);
    if (this.entries.length > 0) {
      this.reporter.warn(['-- WARNINGS:', ...this.entries.map((w) => `WARNING: ${w}`)].join('\n'));
    }
    this.reporter.success(COMPLETION_MARKER);
  }
}

export interface ExitHooks {
  onExit(listener: () => void): () => void;
  onSignal(signal: NodeJS.Signals, listener: () => void): () => void;
  exit(code: number): void;
}

export const processExitHooks: ExitHooks = {
  onExit(listener) {
    process.on('exit', listener);
    return () => {
      process.off('exit', listener);
    };
  },
  onSignal(signal, listener) {
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  },
  exit(code) {
    process.exit(code);
  },
};

export type CompletionGuard = {
  readonly armed: boolean;
  disarm(): void;
};

const SIGNAL_EXIT_CODES: ReadonlyArray<[NodeJS.Signals, number]> = [['SIGINT', 130], ['SIGTERM', 143]];

/**
 * Prints the incomplete-run notice on every way out of the process (normal
 * exit, fatal, interrupt) until disarmed. Disarm right before the success
 * message and nothing else.
 */
export function armCompletionGuard(reporter: Reporter, hooks: ExitHooks = processExitHooks): CompletionGuard {
  let armed = true;
  let fired = false;
  const notify = () => {
    if (!armed || fired) return;
    fired = true;
    reporter.error(INCOMPLETE_NOTICE);
  };

  const unsubscribers = [hooks.onExit(notify)];
  for (const [signal, code] of SIGNAL_EXIT_CODES) {
    unsubscribers.push(hooks.onSignal(signal, () => {
      notify();
      hooks.exit(code);
    }));
  }

  return {
    get armed() {
      return armed;
    },
    disarm() {
      armed = false;
      for (const unsubscribe of unsubscribers) unsubscribe();
    },
  };
}
