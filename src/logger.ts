import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  hint(message: string): void;
}

/**
 * Console logger with colored output
 */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  success: (message) => console.log(chalk.green(message)),
  warn: (message) => console.warn(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
  hint: (message) => console.error(chalk.dim(message)),
};
