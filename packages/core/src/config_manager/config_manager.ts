/**
 * ConfigManager - quickpush run settings
 *
 * Resolution order: command-line overrides, then .quickpush.json, then
 * built-in defaults.
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/repo'));
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ branch: 'main' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */

import type { ConfigStore } from '../config_store/config_store';
import { DEFAULT_COMMIT_MESSAGE } from '../commit_message';
import type {
  ConfigOverrides,
  IConfigManager,
  QuickpushConfig,
  QuickpushConfigFile,
} from './config_manager.types';

export const DEFAULT_QUICKPUSH_CONFIG: Readonly<QuickpushConfig> = Object.freeze({
  remote: 'origin',
  branch: 'master',
  defaultMessage: DEFAULT_COMMIT_MESSAGE,
  pause: true,
});

export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<QuickpushConfigFile | null> {
    return this.configStore.loadConfig();
  }

  async resolveConfig(overrides: ConfigOverrides = {}): Promise<QuickpushConfig> {
    const file = await this.loadConfig() ?? {};

    return {
      remote: overrides.remote ?? file.remote ?? DEFAULT_QUICKPUSH_CONFIG.remote,
      branch: overrides.branch ?? file.branch ?? DEFAULT_QUICKPUSH_CONFIG.branch,
      defaultMessage: overrides.defaultMessage ?? file.defaultMessage ?? DEFAULT_QUICKPUSH_CONFIG.defaultMessage,
      pause: overrides.pause ?? file.pause ?? DEFAULT_QUICKPUSH_CONFIG.pause,
    };
  }
}
