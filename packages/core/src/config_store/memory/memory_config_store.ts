/**
 * MemoryConfigStore - In-memory implementation of ConfigStore for tests
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ branch: 'main' });
 * const manager = new ConfigManager(configStore);
 * ```
 */

import type { ConfigStore } from '../config_store';
import type { QuickpushConfigFile } from '../../config_manager/config_manager.types';
import { validateQuickpushConfigFile } from '../../validation/config_validator';

export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<QuickpushConfigFile | null> {
    if (this.config === null) {
      return null;
    }
    return validateQuickpushConfigFile(this.config, 'memory');
  }

  /**
   * Accepts unvalidated data so tests can exercise schema failures
   */
  setConfig(config: unknown): void {
    this.config = config;
  }

  clear(): void {
    this.config = null;
  }
}
