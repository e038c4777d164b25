import chalk from 'chalk';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger used by every layer. Debug output goes to stderr.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled: boolean = false) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ' ' + JSON.stringify(meta) : '';
    console.error(chalk.gray(`[gitbrief] ${message}${suffix}`));
  }

  info(message: string): void {
    console.log(chalk.blue('ℹ️  ' + message));
  }

  warn(message: string): void {
    console.warn(chalk.yellow('⚠️  ' + message));
  }

  error(message: string): void {
    console.error(chalk.red('❌ ' + message));
  }
}

// For tests and library callers that want silence
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
