import { Command } from 'commander';
import { CommitPush, Validation } from '@quickpush/core';
import { BaseCommand } from '../../base/base-command';
import type { ErrorDetails } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { waitForKeypress } from '../../services/pause-prompt';

/**
 * Options commander hands to the push action.
 * `pause` is false only when --no-pause was given.
 */
export interface PushCommandOptions extends BaseCommandOptions {
  remote?: string;
  branch?: string;
  pause?: boolean;
}

/**
 * PushCommand - stage everything, commit, push with upstream
 *
 * `quickpush [message...]`: the tokens are joined into the commit message.
 * A failed commit is reported and skipped; a failed push sets a non-zero
 * exit code. The keypress pause runs after success and failure alike.
 */
export class PushCommand extends BaseCommand<PushCommandOptions> {

  register(program: Command): void {
    program
      .argument('[message...]', 'Commit message (words are joined with spaces)')
      .option('-r, --remote <name>', 'Remote to push to (default: origin)')
      .option('-b, --branch <name>', 'Remote branch to push to and track (default: master)')
      .option('--no-pause', 'Exit without waiting for a keypress')
      .option('--verbose', 'Show stack traces for failures')
      .option('--quiet', 'Suppress the final success line')
      .action(async (messageParts: string[], options: PushCommandOptions) => {
        await this.execute(messageParts, options);
      });
  }

  async execute(messageParts: string[], options: PushCommandOptions): Promise<void> {
    let pause = options.pause !== false;

    try {
      const configManager = await this.dependencyService.getConfigManager();
      const config = await configManager.resolveConfig({
        remote: options.remote,
        branch: options.branch,
        pause: options.pause === false ? false : undefined,
      });
      pause = config.pause;

      const commitPush = this.dependencyService.getCommitPushModule((line) => console.log(line));
      const result = await commitPush.run({
        messageParts,
        remote: config.remote,
        branch: config.branch,
        defaultMessage: config.defaultMessage,
      });

      this.handleSuccess(`Pushed to ${result.remote}/${result.branch}`, options);
    } catch (error) {
      this.reportFailure(error, options);
    }

    if (pause) {
      await waitForKeypress();
    }
  }

  private reportFailure(error: unknown, options: PushCommandOptions): void {
    if (error instanceof CommitPush.PushFailedError) {
      this.handleError(error.message, options, this.detailsOf(error), error.exitCode);
    } else if (error instanceof Validation.ConfigValidationError) {
      this.handleError(error.message, options);
    } else if (error instanceof Error) {
      this.handleError(error.message, options, this.detailsOf(error));
    } else {
      this.handleError(`Unknown error: ${String(error)}`, options);
    }
  }

  private detailsOf(error: Error): ErrorDetails {
    return error.stack ? { stack: error.stack } : {};
  }
}
