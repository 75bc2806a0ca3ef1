import chalk from 'chalk';

/**
 * User-facing message sink shared by pipeline steps.
 */
export interface Ui {
  /** Top-level progress line */
  say(message: string): void;
  /** Detail line under the current progress line */
  message(message: string): void;
  error(message: string): void;
}

export function isUi(value: unknown): value is Ui {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'say' in value && typeof value.say === 'function' &&
    'message' in value && typeof value.message === 'function' &&
    'error' in value && typeof value.error === 'function'
  );
}

export class ConsoleUi implements Ui {
  constructor(private readonly prefix: string = 'volume') {}

  say(message: string): void {
    console.log(chalk.bold(`==> ${this.prefix}: ${message}`));
  }

  message(message: string): void {
    console.log(`    ${this.prefix}: ${message}`);
  }

  error(message: string): void {
    console.error(chalk.red(`==> ${this.prefix}: ${message}`));
  }
}
