import { GitCommandError } from "../git/errors";

/**
 * Thrown when the final push step fails. Wraps the underlying git failure.
 */
export class PushFailedError extends Error {
  public readonly remote: string;
  public readonly branch: string;
  public readonly exitCode: number;

  constructor(remote: string, branch: string, cause: GitCommandError) {
    super(`Push to ${remote}/${branch} failed`);
    this.name = "PushFailedError";
    this.remote = remote;
    this.branch = branch;
    this.exitCode = cause.exitCode ?? 1;
    this.cause = cause;
    Object.setPrototypeOf(this, PushFailedError.prototype);
  }
}
