import { CommitPush, Config, Fs, Git } from '@quickpush/core';
import { createExecCommand } from './exec-command';

/**
 * Dependency Injection Service for the quickpush CLI
 *
 * Creates and caches the core modules a command needs, wired to the real
 * git binary and the repository's .quickpush.json.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private gitModule: Git.IGitModule | null = null;
  private configManager: Config.IConfigManager | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the singleton (tests)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Creates and returns the git CLI module; the repository root is detected
   * lazily on first use.
   */
  getGitModule(): Git.IGitModule {
    if (!this.gitModule) {
      this.gitModule = new Fs.LocalGitModule({
        execCommand: createExecCommand(),
      });
    }
    return this.gitModule;
  }

  /**
   * Creates the ConfigManager for <repoRoot>/.quickpush.json.
   * Outside a repository it falls back to the current directory and lets
   * the git steps report the problem.
   */
  async getConfigManager(): Promise<Config.IConfigManager> {
    if (this.configManager) {
      return this.configManager;
    }

    let repoRoot: string;
    try {
      repoRoot = await this.getGitModule().getRepoRoot();
    } catch (error) {
      if (!(error instanceof Git.NotAGitRepositoryError)) {
        throw error;
      }
      repoRoot = process.cwd();
    }

    this.configManager = Fs.createConfigManager(repoRoot);
    return this.configManager;
  }

  /**
   * New runner per call; `log` receives the progress notices.
   */
  getCommitPushModule(log: (line: string) => void): CommitPush.CommitPushModule {
    return new CommitPush.CommitPushModule({
      git: this.getGitModule(),
      log,
    });
  }
}
