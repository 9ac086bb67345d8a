import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  plex: {
    url: '',
    token: '',
    timeoutMs: 30000,
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: '10m',
      maxFiles: 14,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  sync: {
    dryRun: false,
    allowUnlock: true,
    updateArtwork: true,
    alwaysUpdateArtwork: false,
    delayMs: 400,
    artworkExtensions: ['mp3', 'm4a', 'jpg', 'jpeg', 'png', 'tbn'],
    showRootDirs: ['tv', 'serie', 'series', 'show', 'shows', 'tvshow', 'tvshows'],
    movieRootDirs: ['movie', 'movies'],
  },
};
