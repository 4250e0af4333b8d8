/**
 * Filesystem and process-backed implementations
 *
 * Use ./memory for in-memory alternatives in tests.
 */

// ConfigStore + ConfigManager factory
export { FsConfigStore, CONFIG_FILE_NAME, createConfigManager } from './config_store/fs';

// GitModule
export { LocalGitModule } from './git/local';
