/**
 * Type Definitions for GitModule
 *
 * Contracts for the Git operations quickpush needs and the injected
 * command runner they go through.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /**
   * 'pipe' captures stdout/stderr into the result (default).
   * 'inherit' streams them to the user's terminal; the result then carries empty strings.
   */
  stdio?: 'pipe' | 'inherit';
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

export type CommitOptions = {
  /** Capture git's output instead of showing it */
  quiet?: boolean;
};

/**
 * Git operations used by the commit-and-push flow.
 *
 * Implementations:
 * - LocalGitModule: runs the git CLI
 * - MemoryGitModule: in-memory double for tests
 */
export interface IGitModule {
  /** Absolute path of the working tree root */
  getRepoRoot(): Promise<string>;
  /** Stages every added, modified and deleted file in the working tree */
  addAll(): Promise<void>;
  /** Commits the staged changes and returns the new commit hash */
  commit(message: string, options?: CommitOptions): Promise<string>;
  /** Pushes to remote/branch and records it as the upstream */
  pushWithUpstream(remote: string, branchName: string): Promise<void>;
}
