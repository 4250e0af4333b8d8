/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads <repoRoot>/.quickpush.json. A missing or unparsable file yields null
 * (the defaults apply); a file that parses but fails the schema throws.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { QuickpushConfigFile } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { validateQuickpushConfigFile } from '../../validation/config_validator';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[ConfigStore] ');

export const CONFIG_FILE_NAME = '.quickpush.json';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(repoRoot: string) {
    this.configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<QuickpushConfigFile | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        logger.warn(`Could not read ${this.configPath}; using defaults.`, error);
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn(`Ignoring ${this.configPath}: not valid JSON.`, error);
      return null;
    }

    return validateQuickpushConfigFile(parsed, this.configPath);
  }
}

/**
 * Create a ConfigManager reading .quickpush.json from repoRoot
 */
export function createConfigManager(repoRoot: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(repoRoot));
}
