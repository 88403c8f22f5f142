import chalk from 'chalk';
import { confirm, intro, isCancel, log, note, outro, text } from '@clack/prompts';
import { FatalError } from './errors.js';

export interface Reporter {
  intro(title: string): void;
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  /** Written to stderr. */
  error(message: string): void;
  debug(message: string): void;
  note(body: string, title: string): void;
  outro(message: string): void;
}

export interface Prompter {
  text(message: string, opts?: { placeholder?: string; defaultValue?: string }): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

export function createConsoleReporter(opts: { verbose?: boolean } = {}): Reporter {
  return {
    intro: (title) => intro(chalk.cyan(title)),
    step: (message) => log.step(message),
    info: (message) => log.info(message),
    success: (message) => log.success(chalk.green(message)),
    warn: (message) => log.warn(chalk.yellow(message)),
    error: (message) => {
      process.stderr.write(`${chalk.red(message)}\n`);
    },
    debug: (message) => {
      if (opts.verbose) log.message(chalk.dim(message));
    },
    note: (body, title) => note(body, title),
    outro: (message) => outro(message),
  };
}

function cancelled(): never {
  throw new FatalError('Cancelled by operator');
}

export function createClackPrompter(): Prompter {
  return {
    async text(message, opts = {}) {
      const value = await text({ message, placeholder: opts.placeholder, defaultValue: opts.defaultValue });
      if (isCancel(value)) cancelled();
      return value;
    },
    async confirm(message) {
      const value = await confirm({ message });
      if (isCancel(value)) cancelled();
      return value;
    },
  };
}
