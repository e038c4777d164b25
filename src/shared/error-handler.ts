import chalk from 'chalk';
import { i18n } from '../i18n';
import { AbortedByUserError, isGitbriefError } from './errors';

export interface ErrorContext {
  operation: string;
  debug?: boolean;
}

export class ErrorHandler {
  /**
   * Prints a fatal error and returns the exit code the process should use
   */
  static handle(error: unknown, context: ErrorContext): number {
    const outputs = i18n().getOutputs();

    if (error instanceof AbortedByUserError) {
      console.error(chalk.yellow('\n' + outputs.aborted));
      return 130;
    }

    if (isGitbriefError(error)) {
      console.error(chalk.red(`❌ [${error.code}] ${error.message}`));
      if (error.hint) {
        console.log(chalk.gray('💡 ' + error.hint));
      }
    } else {
      console.error(chalk.red(`❌ ${outputs.unexpectedError(context.operation)}: ${this.getErrorMessage(error)}`));
    }

    if (context.debug) {
      console.error(chalk.gray('\n[Debug] Original error:'));
      console.error(error);
    }

    return 1;
  }

  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
