export { MemoryGitModule } from './memory_git_module';
export type { MemoryGitCall, MemoryCommit } from './memory_git_module';
