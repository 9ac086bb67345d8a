#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { ConfigManager } from './config/ConfigManager.js';
import type { LoggingConfig, RunMode } from './config/types.js';
import { initializeLogger, logger } from './middleware/logging.js';
import { ApplicationError, CatalogConnectionError, ConfigurationError, UserQuitError } from './errors/index.js';
import { createErrorLogContext, getErrorMessage } from './utils/errorHandling.js';
import { normalizeScanPath } from './utils/pathUtils.js';
import { parseRunOptions } from './validation/runOptionsSchema.js';
import { PlexClient } from './services/catalog/PlexClient.js';
import { PlexCatalogService } from './services/catalog/PlexCatalogService.js';
import { findSidecarFiles, groupIntoMediaUnits } from './services/nfo/nfoDiscovery.js';
import { ConsolePrompter } from './services/prompt/ConsolePrompter.js';
import { runSync } from './services/run/syncService.js';
import { formatSummary } from './services/run/summaryReporter.js';
import type { ResolutionMode } from './services/matching/resolutionPolicy.js';

interface CliOptions {
  scanPath?: string;
  dryRun: boolean;
  debug: boolean;
  logging: boolean;
  unlock: boolean;
  art: boolean;
  alwaysUpdateArt: boolean;
  delay?: number;
}

function parseDelay(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Delay must be a non-negative integer (milliseconds).');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command('nfo-sync')
    .description('Push metadata and artwork from NFO sidecar files to a Plex Media Server')
    .option('--scan-path <path>', 'directory to scan for NFO files (omit for interactive mode)')
    .option('--dry-run', 'log the planned changes without writing anything', false)
    .option('--debug', 'verbose logging and a full list of updated items', false)
    .option('--no-logging', 'do not write log files')
    .option('--no-unlock', 'leave locked Plex fields untouched')
    .option('--no-art', 'do not upload artwork or themes')
    .option('--always-update-art', 'upload artwork even when no metadata changed', false)
    .option('--delay <ms>', 'pause after each Plex write, in milliseconds', parseDelay);
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const cli = program.opts<CliOptions>();

  let prompter: ConsolePrompter | null = null;

  try {
    const configManager = ConfigManager.getInstance();
    const baseLogging = configManager.getLoggingConfig();
    const loggingConfig: LoggingConfig = {
      ...baseLogging,
      level: cli.debug ? 'debug' : baseLogging.level,
      file: { ...baseLogging.file, enabled: cli.logging && baseLogging.file.enabled },
    };
    initializeLogger(loggingConfig);

    configManager.validate();
    const sync = configManager.getSyncConfig();

    let mode: RunMode = 'unattended';
    let rawPath = cli.scanPath;
    if (!rawPath) {
      mode = 'interactive';
      prompter = new ConsolePrompter();
      process.stdout.write('Interactive mode:\n');
      rawPath = await prompter.askScanPath();
      if (!rawPath) {
        throw new ConfigurationError('scanPath', 'No path provided.');
      }
    }

    const options = parseRunOptions({
      ...sync,
      mode,
      scanPath: normalizeScanPath(rawPath),
      dryRun: cli.dryRun || sync.dryRun,
      allowUnlock: cli.unlock && sync.allowUnlock,
      updateArtwork: cli.art && sync.updateArtwork,
      alwaysUpdateArtwork: cli.alwaysUpdateArt || sync.alwaysUpdateArtwork,
      delayMs: cli.delay ?? sync.delayMs,
    });

    process.stdout.write(
      `Dry-run mode: ${options.dryRun ? 'ON (no changes)' : 'OFF (changes will be applied)'}\n`
    );

    const plex = configManager.getPlexConfig();
    const catalog = new PlexCatalogService(
      new PlexClient({ baseUrl: plex.url, token: plex.token, timeoutMs: plex.timeoutMs })
    );
    await catalog.connect();

    const files = await findSidecarFiles(options.scanPath ?? rawPath);
    if (files.length === 0) {
      logger.info('No NFO files found');
    }
    const grouped = groupIntoMediaUnits(files, options);

    const resolutionMode: ResolutionMode = prompter
      ? { kind: 'interactive', chooser: prompter }
      : { kind: 'unattended' };

    const result = await runSync(grouped, { catalog, options, mode: resolutionMode });

    process.stdout.write(
      `${formatSummary(result.summary, { dryRun: options.dryRun, verbose: cli.debug })}\n`
    );
    return 0;
  } catch (error) {
    if (error instanceof UserQuitError) {
      logger.info('Quit before the run started');
      return 0;
    }
    if (error instanceof ConfigurationError || error instanceof CatalogConnectionError) {
      logger.error(error.message);
      return 1;
    }
    if (error instanceof ApplicationError && error.isOperational) {
      logger.error(`Run aborted: ${error.message}`, error.toJSON());
      return 1;
    }
    logger.error('Unexpected error', createErrorLogContext(error));
    return 1;
  } finally {
    prompter?.close();
  }
}

if (require.main === module) {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
      reason: reason instanceof Error ? { name: reason.name, message: reason.message, stack: reason.stack } : reason,
    });
    process.exitCode = 1;
  });

  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Failed to run nfo-sync', { error: getErrorMessage(error) });
      process.exitCode = 1;
    });
}
