/**
 * ConfigManager Tests
 */

import { ConfigManager } from '../../src/config/ConfigManager.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { ConfigurationError } from '../../src/errors/index.js';

const MANAGED_KEYS = [
  'PLEX_URL',
  'PLEX_TOKEN',
  'PLEX_TIMEOUT_MS',
  'LOG_LEVEL',
  'LOG_FILE_ENABLED',
  'LOG_FILE_PATH',
  'LOG_CONSOLE_ENABLED',
  'NFO_SYNC_DELAY_MS',
  'NFO_SYNC_ARTWORK_EXTENSIONS',
  'NFO_SYNC_SHOW_DIRS',
  'NFO_SYNC_MOVIE_DIRS',
];

describe('ConfigManager', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of MANAGED_KEYS) {
      delete process.env[key];
    }
    ConfigManager.reset();
  });

  afterAll(() => {
    process.env = originalEnv;
    ConfigManager.reset();
  });

  it('should read Plex and sync settings from the environment', () => {
    process.env.PLEX_URL = 'http://plex.local:32400/';
    process.env.PLEX_TOKEN = 'test-token';
    process.env.NFO_SYNC_DELAY_MS = '250';
    process.env.NFO_SYNC_SHOW_DIRS = 'tv, anime,';
    process.env.LOG_LEVEL = 'debug';
    process.env.LOG_FILE_ENABLED = 'false';

    const config = ConfigManager.getInstance();

    expect(config.getPlexConfig()).toEqual({ url: 'http://plex.local:32400', token: 'test-token', timeoutMs: 30000 });
    expect(config.getSyncConfig().delayMs).toBe(250);
    expect(config.getSyncConfig().showRootDirs).toEqual(['tv', 'anime']);
    expect(config.getSyncConfig().movieRootDirs).toEqual(['movie', 'movies']);
    expect(config.getLoggingConfig().level).toBe('debug');
    expect(config.getLoggingConfig().file.enabled).toBe(false);
    expect(() => config.validate()).not.toThrow();
  });

  it('should leave the defaults untouched', () => {
    process.env.NFO_SYNC_SHOW_DIRS = 'anime';

    ConfigManager.getInstance().getSyncConfig().movieRootDirs.push('films');

    expect(defaultConfig.sync.showRootDirs).toContain('tv');
    expect(defaultConfig.sync.movieRootDirs).toEqual(['movie', 'movies']);
  });

  it('should return the same instance until reset', () => {
    const first = ConfigManager.getInstance();

    expect(ConfigManager.getInstance()).toBe(first);
    ConfigManager.reset();
    expect(ConfigManager.getInstance()).not.toBe(first);
  });

  it('should report missing connection settings on validate', () => {
    process.env.PLEX_URL = 'http://plex.local:32400';

    const config = ConfigManager.getInstance();

    expect(() => config.validate()).toThrow(ConfigurationError);
    expect(() => config.validate()).toThrow('PLEX_TOKEN is not set');
  });

  it('should reject malformed numbers and log levels', () => {
    process.env.NFO_SYNC_DELAY_MS = 'soon';
    expect(() => ConfigManager.getInstance()).toThrow('Environment variable NFO_SYNC_DELAY_MS must be a valid number');

    delete process.env.NFO_SYNC_DELAY_MS;
    process.env.LOG_LEVEL = 'verbose';
    expect(() => ConfigManager.getInstance()).toThrow(ConfigurationError);
  });
});
