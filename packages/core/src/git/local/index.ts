/**
 * Local Git Module - CLI-based implementation
 *
 * @module git/local
 */

export { LocalGitModule } from './local_git_module';
