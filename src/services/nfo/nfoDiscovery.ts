import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { ConfigurationError } from '../../errors/index.js';
import type { MediaKind } from '../../types/sidecar.js';

/**
 * A library folder (one show or one movie) and the NFO files under it
 */
export interface MediaUnit {
  /** Folder basename, used as the parent search title */
  name: string;
  path: string;
  kind: Extract<MediaKind, 'movie' | 'show'>;
  files: string[];
}

export interface RootDirs {
  showRootDirs: readonly string[];
  movieRootDirs: readonly string[];
}

export interface GroupedSidecars {
  units: MediaUnit[];
  /** Files that are not below any recognised library root folder */
  unmatched: string[];
}

/**
 * Recursively collect every *.nfo file below a directory, sorted by path
 *
 * @throws {ConfigurationError} if the scan path does not exist
 */
export async function findSidecarFiles(scanPath: string): Promise<string[]> {
  try {
    await fs.access(scanPath);
  } catch (error) {
    throw new ConfigurationError(
      'scanPath',
      `Provided path does not exist (${scanPath}): ${getErrorMessage(error)}`
    );
  }

  const stat = await fs.stat(scanPath);
  if (stat.isFile()) {
    return scanPath.toLowerCase().endsWith('.nfo') ? [scanPath] : [];
  }

  const nfoFiles = await walk(scanPath);
  nfoFiles.sort();

  logger.info(`${nfoFiles.length} NFO files found in ${scanPath}`);
  return nfoFiles;
}

async function walk(dir: string): Promise<string[]> {
  const found: string[] = [];

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot read directory ${dir}`, { error: getErrorMessage(error) });
    return found;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      found.push(...(await walk(fullPath)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.nfo')) {
      found.push(fullPath);
    }
  }

  return found;
}

/**
 * Group NFO files by library folder
 *
 * The first directory segment whose name is a configured root dir marks the
 * library; the segment after it is the media unit (e.g. /mnt/media/tv/Show).
 * Units keep first-seen order.
 */
export function groupIntoMediaUnits(files: readonly string[], rootDirs: RootDirs): GroupedSidecars {
  const showDirs = new Set(rootDirs.showRootDirs.map(dir => dir.toLowerCase()));
  const movieDirs = new Set(rootDirs.movieRootDirs.map(dir => dir.toLowerCase()));
  const units = new Map<string, MediaUnit>();
  const unmatched: string[] = [];

  for (const file of files) {
    const normalized = path.normalize(file);
    const parts = normalized.split(path.sep);
    // last part is the file name, the unit folder must be a directory
    const dirCount = parts.length - 1;
    let placed = false;

    for (let idx = 0; idx < dirCount - 1; idx++) {
      const segment = parts[idx].toLowerCase();
      const kind = showDirs.has(segment) ? 'show' : movieDirs.has(segment) ? 'movie' : null;
      if (!kind) {
        continue;
      }

      const unitPath = parts.slice(0, idx + 2).join(path.sep);
      const name = parts[idx + 1];
      const existing = units.get(name);

      if (existing) {
        existing.files.push(file);
      } else {
        units.set(name, { name, path: unitPath, kind, files: [file] });
      }

      placed = true;
      break;
    }

    if (!placed) {
      unmatched.push(file);
    }
  }

  logger.debug(`Grouped NFO files into ${units.size} media units`, {
    units: [...units.keys()],
    unmatched: unmatched.length,
  });

  return { units: [...units.values()], unmatched };
}
