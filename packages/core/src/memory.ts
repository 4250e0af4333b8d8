/**
 * In-memory implementations (no filesystem or git required)
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryGitCall, MemoryCommit } from './git/memory';
