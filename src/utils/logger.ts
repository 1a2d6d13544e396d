import chalk from 'chalk';

export type HeadingTone = 'normal' | 'danger';

export interface Logger {
  heading(message: string, tone?: HeadingTone): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  hint(message: string): void;
  /** An external command line about to run. */
  command(line: string): void;
  plain(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    heading: (message, tone = 'normal') =>
      console.log(tone === 'danger' ? chalk.red(message) : chalk.yellow(message)),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.log(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
    hint: (message) => console.log(chalk.gray(message)),
    command: (line) => console.log(chalk.gray(line)),
    plain: (message) => console.log(message),
  };
}
