import dotenv from 'dotenv';
import { AppConfig, LoggingConfig, PlexConfig, SyncConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance (tests swap process.env between cases)
   */
  static reset(): void {
    ConfigManager.instance = undefined;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Plex connection; presence is checked in validate() so --help works without it
    config.plex.url = (process.env.PLEX_URL ?? '').trim().replace(/\/+$/, '');
    config.plex.token = (process.env.PLEX_TOKEN ?? '').trim();
    config.plex.timeoutMs = this.getNumber('PLEX_TIMEOUT_MS', config.plex.timeoutMs);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Sync behaviour
    config.sync.delayMs = this.getNumber('NFO_SYNC_DELAY_MS', config.sync.delayMs);
    config.sync.artworkExtensions = this.getStringArray(
      'NFO_SYNC_ARTWORK_EXTENSIONS',
      config.sync.artworkExtensions
    );
    config.sync.showRootDirs = this.getStringArray('NFO_SYNC_SHOW_DIRS', config.sync.showRootDirs);
    config.sync.movieRootDirs = this.getStringArray('NFO_SYNC_MOVIE_DIRS', config.sync.movieRootDirs);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value && value.trim() ? value.trim() : defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getPlexConfig(): PlexConfig {
    return this.config.plex;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getSyncConfig(): SyncConfig {
    return this.config.sync;
  }

  /**
   * Throws when the Plex connection settings are missing
   */
  validate(): void {
    const errors: string[] = [];

    if (!this.config.plex.url) {
      errors.push('PLEX_URL is not set (e.g. PLEX_URL=http://your-plex:32400)');
    }
    if (!this.config.plex.token) {
      errors.push('PLEX_TOKEN is not set');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'plex',
        `Configuration validation failed:\n${errors.join('\n')}\nSet them in a .env file or the environment.`
      );
    }
  }
}
