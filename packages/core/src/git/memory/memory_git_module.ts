/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setWorkingTreeChanges(files): Files waiting to be staged
 * - failNextAdd(stderr) / failNextPush(stderr, exitCode): Inject failures
 * - getCalls(): Ordered record of every operation
 * - getCommits() / getUpstream(): Inspect resulting state
 *
 * @module git/memory
 */

import type { CommitOptions, IGitModule } from '../types';
import { GitCommandError } from '../errors';

export type MemoryGitCall =
  | { op: 'addAll' }
  | { op: 'commit'; message: string; quiet: boolean }
  | { op: 'pushWithUpstream'; remote: string; branch: string };

export interface MemoryCommit {
  hash: string;
  message: string;
  files: string[];
}

interface InjectedFailure {
  stderr: string;
  exitCode: number;
}

interface MemoryGitState {
  repoRoot: string;
  workingTree: string[];
  stagedFiles: string[];
  commits: MemoryCommit[];
  pushed: Map<string, string[]>; // "remote/branch" -> commit hashes
  upstream: { remote: string; branch: string } | null;
  calls: MemoryGitCall[];
  addFailure: InjectedFailure | null;
  pushFailure: InjectedFailure | null;
}

export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;

  constructor(repoRoot: string = '/test/repo') {
    this.state = MemoryGitModule.emptyState(repoRoot);
  }

  private static emptyState(repoRoot: string): MemoryGitState {
    return {
      repoRoot,
      workingTree: [],
      stagedFiles: [],
      commits: [],
      pushed: new Map(),
      upstream: null,
      calls: [],
      addFailure: null,
      pushFailure: null,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setWorkingTreeChanges(files: string[]): void {
    this.state.workingTree = [...files];
  }

  failNextAdd(stderr: string = 'fatal: unable to stage', exitCode: number = 128): void {
    this.state.addFailure = { stderr, exitCode };
  }

  failNextPush(stderr: string = 'fatal: could not read from remote repository', exitCode: number = 128): void {
    this.state.pushFailure = { stderr, exitCode };
  }

  getCalls(): MemoryGitCall[] {
    return [...this.state.calls];
  }

  getStagedFiles(): string[] {
    return [...this.state.stagedFiles];
  }

  getCommits(): MemoryCommit[] {
    return [...this.state.commits];
  }

  getPushedCommits(remote: string, branch: string): string[] {
    return [...(this.state.pushed.get(`${remote}/${branch}`) ?? [])];
  }

  getUpstream(): { remote: string; branch: string } | null {
    return this.state.upstream;
  }

  clear(): void {
    this.state = MemoryGitModule.emptyState(this.state.repoRoot);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.state.repoRoot;
  }

  async addAll(): Promise<void> {
    this.state.calls.push({ op: 'addAll' });

    const failure = this.state.addFailure;
    if (failure) {
      this.state.addFailure = null;
      throw new GitCommandError('Failed to stage changes', failure.stderr, 'git add -A', '', failure.exitCode);
    }

    for (const file of this.state.workingTree) {
      if (!this.state.stagedFiles.includes(file)) {
        this.state.stagedFiles.push(file);
      }
    }
    this.state.workingTree = [];
  }

  async commit(message: string, options?: CommitOptions): Promise<string> {
    this.state.calls.push({ op: 'commit', message, quiet: options?.quiet ?? false });

    if (this.state.stagedFiles.length === 0) {
      throw new GitCommandError(
        'Failed to create commit',
        '',
        'git commit',
        'nothing to commit, working tree clean\n',
        1
      );
    }

    const hash = `commit-${this.state.commits.length + 1}`;
    this.state.commits.push({ hash, message, files: [...this.state.stagedFiles] });
    this.state.stagedFiles = [];
    return hash;
  }

  async pushWithUpstream(remote: string, branchName: string): Promise<void> {
    this.state.calls.push({ op: 'pushWithUpstream', remote, branch: branchName });

    const failure = this.state.pushFailure;
    if (failure) {
      this.state.pushFailure = null;
      throw new GitCommandError(
        `Failed to push ${branchName} to ${remote}`,
        failure.stderr,
        `git push -u ${remote} ${branchName}`,
        '',
        failure.exitCode
      );
    }

    this.state.pushed.set(`${remote}/${branchName}`, this.state.commits.map((c) => c.hash));
    this.state.upstream = { remote, branch: branchName };
  }
}
