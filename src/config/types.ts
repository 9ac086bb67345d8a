export interface PlexConfig {
  url: string;
  token: string;
  timeoutMs: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface SyncConfig {
  dryRun: boolean;
  allowUnlock: boolean;
  updateArtwork: boolean;
  alwaysUpdateArtwork: boolean;
  delayMs: number; // pause after each successful mutation
  artworkExtensions: string[];
  showRootDirs: string[];
  movieRootDirs: string[];
}

export interface AppConfig {
  plex: PlexConfig;
  logging: LoggingConfig;
  sync: SyncConfig;
}

export type RunMode = 'unattended' | 'interactive';

/**
 * Settings consumed by the sync pipeline for a single run
 */
export interface RunOptions extends SyncConfig {
  mode: RunMode;
  scanPath?: string | undefined;
}
