import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Absolute, normalized path with `~` expanded and no trailing separator
 */
export function normalizeScanPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }

  const expanded = trimmed === '~' || trimmed.startsWith(`~${path.sep}`)
    ? path.join(os.homedir(), trimmed.slice(1))
    : trimmed;

  const resolved = path.normalize(path.resolve(expanded));
  const root = path.parse(resolved).root;

  return resolved.length > root.length ? resolved.replace(/[\\/]+$/, '') : resolved;
}

/**
 * readline completer for filesystem paths; directories get a trailing separator
 */
export function completePath(line: string): [string[], string] {
  const expanded = line.startsWith('~') ? path.join(os.homedir(), line.slice(1)) : line;
  const endsWithSep = expanded.endsWith(path.sep);
  const dir = endsWithSep ? expanded : path.dirname(expanded);
  const partial = endsWithSep ? '' : path.basename(expanded);
  const prefix = endsWithSep || expanded.includes(path.sep) ? dir : '';

  let entries: fs.Dirent[] = [];
  try {
    entries = fs.readdirSync(dir || '.', { withFileTypes: true });
  } catch {
    return [[], line];
  }

  const matches = entries
    .filter(entry => entry.name.toLowerCase().startsWith(partial.toLowerCase()))
    .map(entry => {
      const full = prefix ? path.join(prefix, entry.name) : entry.name;
      return entry.isDirectory() ? `${full}${path.sep}` : full;
    })
    .sort();

  return [matches, expanded];
}
