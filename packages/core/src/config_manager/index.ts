export { ConfigManager, DEFAULT_QUICKPUSH_CONFIG } from './config_manager';
export type {
  QuickpushConfig,
  QuickpushConfigFile,
  ConfigOverrides,
  IConfigManager,
} from './config_manager.types';
