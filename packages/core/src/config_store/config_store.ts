/**
 * ConfigStore Interface
 *
 * Abstraction over where .quickpush.json comes from (filesystem, or memory
 * for tests).
 */

import type { QuickpushConfigFile } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * @returns the validated file contents, or null when there is no usable file
   * @throws ConfigValidationError when the file parses but breaks the schema
   */
  loadConfig(): Promise<QuickpushConfigFile | null>;
}
