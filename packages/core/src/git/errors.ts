/**
 * Custom Error Classes for GitModule
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command exits non-zero
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout: string;
  public readonly command: string | undefined;
  public readonly exitCode: number | undefined;

  constructor(
    message: string,
    stderr: string = '',
    command?: string,
    stdout: string = '',
    exitCode?: number
  ) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when the working directory is not inside a Git repository
 */
export class NotAGitRepositoryError extends GitError {
  public readonly cwd: string;
  public readonly stderr: string;

  constructor(cwd: string, stderr: string = '') {
    super(`Not in a Git repository: ${cwd}`);
    this.name = 'NotAGitRepositoryError';
    this.cwd = cwd;
    this.stderr = stderr;
    Object.setPrototypeOf(this, NotAGitRepositoryError.prototype);
  }
}

export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}
