import type { IGitModule } from "../git";
import { isGitCommandError } from "../git/errors";
import { createLogger } from "../logger/logger";
import type { Logger } from "../logger";
import { resolveCommitMessage } from "../commit_message";
import { PushFailedError } from "./errors";
import { COMMIT_PUSH_NOTICES } from "./types";
import type {
  CommitPushModuleDependencies,
  CommitPushOptions,
  CommitPushResult,
} from "./types";

/**
 * CommitPushModule - stage, commit, push
 *
 * Runs the three git steps strictly in order, each awaited before the next.
 * A failed commit is reported and skipped; a failed push is thrown to the
 * caller. Waiting for acknowledgment afterwards is the caller's concern.
 */
export class CommitPushModule {
  private readonly git: IGitModule;
  private readonly log: (line: string) => void;
  private readonly logger: Logger;

  constructor(dependencies: CommitPushModuleDependencies) {
    this.git = dependencies.git;
    this.log = dependencies.log;
    this.logger = dependencies.logger ?? createLogger("[CommitPush] ");
  }

  /**
   * @throws PushFailedError if git push exits non-zero
   */
  async run(options: CommitPushOptions): Promise<CommitPushResult> {
    const { remote, branch } = options;
    const message = resolveCommitMessage(options.messageParts, options.defaultMessage);

    const staged = await this.stage();
    const commitHash = await this.commit(message);
    await this.push(remote, branch);

    return {
      message,
      staged,
      committed: commitHash !== undefined,
      ...(commitHash !== undefined ? { commitHash } : {}),
      remote,
      branch,
    };
  }

  private async stage(): Promise<boolean> {
    this.log(COMMIT_PUSH_NOTICES.staging);
    try {
      await this.git.addAll();
      return true;
    } catch (error) {
      // Staging outcome does not gate the rest of the sequence
      if (!isGitCommandError(error)) {
        throw error;
      }
      this.logger.warn(`Staging reported a failure (exit ${error.exitCode ?? "?"}); continuing.`);
      return false;
    }
  }

  private async commit(message: string): Promise<string | undefined> {
    this.log(COMMIT_PUSH_NOTICES.committing(message));
    try {
      const hash = await this.git.commit(message, { quiet: true });
      this.logger.debug(`Created commit ${hash}`);
      return hash;
    } catch (error) {
      if (!isGitCommandError(error)) {
        throw error;
      }
      this.logger.debug(`git commit exited ${error.exitCode ?? "?"}: ${error.stdout.trim() || error.stderr.trim()}`);
      this.log(COMMIT_PUSH_NOTICES.commitSkipped);
      return undefined;
    }
  }

  private async push(remote: string, branch: string): Promise<void> {
    this.log(COMMIT_PUSH_NOTICES.pushing);
    try {
      await this.git.pushWithUpstream(remote, branch);
    } catch (error) {
      if (isGitCommandError(error)) {
        throw new PushFailedError(remote, branch, error);
      }
      throw error;
    }
  }
}
