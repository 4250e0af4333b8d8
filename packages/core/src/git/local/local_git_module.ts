/**
 * LocalGitModule - git CLI implementation of IGitModule
 *
 * Every call goes through the injected execCommand, so tests can stub the
 * process layer and the CLI can decide how output reaches the terminal.
 *
 * @module git/local
 */

import type {
  CommitOptions,
  ExecCommand,
  ExecOptions,
  ExecResult,
  GitModuleDependencies,
  IGitModule,
} from '../types';
import { GitCommandError, NotAGitRepositoryError } from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitModule] ');

export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private readonly execCommand: ExecCommand;

  /**
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Runs git in the repository root, resolving the root on first use.
   * When no root can be resolved, git runs in the current directory and
   * reports the problem through its own exit code.
   */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.resolveCwd();
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  private async resolveCwd(): Promise<string> {
    try {
      return await this.getRepoRoot();
    } catch (error) {
      if (!(error instanceof NotAGitRepositoryError)) {
        throw error;
      }
      logger.debug(`No repository root found; running git in ${error.cwd}`);
      return error.cwd;
    }
  }

  private fail(message: string, args: string[], result: ExecResult): GitCommandError {
    return new GitCommandError(
      message,
      result.stderr,
      `git ${args.join(' ')}`,
      result.stdout,
      result.exitCode
    );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Returns the working tree root, detecting it with `git rev-parse --show-toplevel`
   *
   * @throws NotAGitRepositoryError if the current directory is not in a repository
   */
  async getRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const cwd = process.cwd();
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel'], { cwd });
      if (result.exitCode !== 0) {
        throw new NotAGitRepositoryError(cwd, result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CHANGES
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Stages all changes in the working tree (`git add -A`).
   * Output is streamed to the user.
   *
   * @throws GitCommandError if git exits non-zero
   */
  async addAll(): Promise<void> {
    const args = ['add', '-A'];
    const result = await this.execGit(args, { stdio: 'inherit' });

    if (result.exitCode !== 0) {
      throw this.fail('Failed to stage changes', args, result);
    }
  }

  /**
   * Creates a commit from the staged changes
   *
   * @returns Commit hash of the created commit
   * @throws GitCommandError if git exits non-zero (e.g. nothing to commit)
   *
   * @example
   * const hash = await gitModule.commit("Fix login bug", { quiet: true });
   */
  async commit(message: string, options?: CommitOptions): Promise<string> {
    // A single -m keeps embedded newlines exactly as given
    const args = ['commit', '-m', message];

    const stdio = options?.quiet ? 'pipe' : 'inherit';
    const result = await this.execGit(args, { stdio });

    if (result.exitCode !== 0) {
      throw this.fail('Failed to create commit', args, result);
    }

    const hashResult = await this.execGit(['rev-parse', 'HEAD']);
    return hashResult.stdout.trim();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Pushes a branch and sets it as the upstream (`git push -u`).
   * Output is streamed to the user.
   *
   * @throws GitCommandError if git exits non-zero
   *
   * @example
   * await gitModule.pushWithUpstream("origin", "master");
   */
  async pushWithUpstream(remote: string, branchName: string): Promise<void> {
    const args = ['push', '-u', remote, branchName];
    const result = await this.execGit(args, { stdio: 'inherit' });

    if (result.exitCode !== 0) {
      throw this.fail(`Failed to push ${branchName} to ${remote}`, args, result);
    }
  }
}
