/**
 * Base Command Class for the quickpush CLI
 *
 * Shared output and error handling. Errors set process.exitCode instead of
 * exiting, so a command can still run its closing steps (the keypress pause).
 */

import type { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Extra detail a failure can carry for --verbose output
 */
export interface ErrorDetails {
  stack?: string;
}

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, details?: ErrorDetails, exitCode: number = 1): void {
    // Only add ❌ if message doesn't already have it
    const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
    console.error(formattedMessage);

    if (options.verbose && details?.stack) {
      console.error(`🔍 Technical details: ${details.stack}`);
    }

    process.exitCode = exitCode;
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(message: string, options: TOptions): void {
    if (!options.quiet) {
      console.log(`✅ ${message}`);
    }
  }
}
