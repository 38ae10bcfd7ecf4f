import chalk from 'chalk';

export interface LoggerOptions {
  // Suppresses info/success/warn output; errors are always printed
  quiet?: boolean;
  verbose?: boolean;
}

export class Logger {
  constructor(private context: string, private options: LoggerOptions = {}) {}

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.options);
  }

  info(message: string, ...args: unknown[]) {
    if (this.options.quiet) return;
    console.log(chalk.blue(`[${this.context}]`), message, ...args);
  }

  success(message: string, ...args: unknown[]) {
    if (this.options.quiet) return;
    console.log(chalk.green(`✓ [${this.context}]`), message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    if (this.options.quiet) return;
    console.warn(chalk.yellow(`⚠ [${this.context}]`), message, ...args);
  }

  error(message: string, error?: unknown) {
    console.error(chalk.red(`✗ [${this.context}]`), message);
    if (error) {
      console.error(chalk.red('Error details:'), error);
    }
  }

  debug(message: string, ...args: unknown[]) {
    if (this.options.verbose || process.env.DEBUG) {
      console.log(chalk.gray(`[${this.context}]`), message, ...args);
    }
  }
}
