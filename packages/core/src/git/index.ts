/**
 * Git - the Git operations quickpush performs
 *
 * @module git
 */

export { LocalGitModule } from './local';

export type {
  IGitModule,
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitOptions,
} from './types';

export {
  GitError,
  GitCommandError,
  NotAGitRepositoryError,
  isGitCommandError,
} from './errors';
