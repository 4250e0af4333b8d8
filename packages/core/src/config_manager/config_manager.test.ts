import { ConfigManager, DEFAULT_QUICKPUSH_CONFIG } from './config_manager';
import { MemoryConfigStore } from '../config_store/memory';
import { ConfigValidationError } from '../validation/errors';

describe('ConfigManager', () => {
  let configStore: MemoryConfigStore;
  let configManager: ConfigManager;

  beforeEach(() => {
    configStore = new MemoryConfigStore();
    configManager = new ConfigManager(configStore);
  });

  describe('resolveConfig', () => {
    it('[C-A1] should return the built-in defaults without a file or overrides', async () => {
      expect(await configManager.resolveConfig()).toEqual({
        remote: 'origin',
        branch: 'master',
        defaultMessage: 'latest updates',
        pause: true,
      });
      expect(DEFAULT_QUICKPUSH_CONFIG.branch).toBe('master');
    });

    it('[C-A2] should apply file values over defaults', async () => {
      configStore.setConfig({ branch: 'main', pause: false });

      expect(await configManager.resolveConfig()).toEqual({
        remote: 'origin',
        branch: 'main',
        defaultMessage: 'latest updates',
        pause: false,
      });
    });

    it('[C-A3] should apply overrides over file values', async () => {
      configStore.setConfig({ remote: 'upstream', branch: 'main', defaultMessage: 'wip' });

      const config = await configManager.resolveConfig({ branch: 'release', pause: false });

      expect(config).toEqual({
        remote: 'upstream',
        branch: 'release',
        defaultMessage: 'wip',
        pause: false,
      });
    });

    it('[C-A4] should ignore undefined overrides', async () => {
      configStore.setConfig({ remote: 'upstream' });

      const config = await configManager.resolveConfig({ remote: undefined, pause: undefined });

      expect(config.remote).toBe('upstream');
      expect(config.pause).toBe(true);
    });

    it('[C-A5] should propagate schema violations', async () => {
      configStore.setConfig({ remote: '' });

      await expect(configManager.resolveConfig()).rejects.toBeInstanceOf(ConfigValidationError);
    });
  });

  describe('loadConfig', () => {
    it('[C-B1] should return null when no config is stored', async () => {
      expect(await configManager.loadConfig()).toBeNull();
    });

    it('[C-B2] should return the stored file contents', async () => {
      configStore.setConfig({ defaultMessage: 'sync' });

      expect(await configManager.loadConfig()).toEqual({ defaultMessage: 'sync' });
    });
  });
});
