import type { RunSummary } from './RunStatistics.js';

export interface SummaryOptions {
  dryRun: boolean;
  /** List every updated item, not just the count */
  verbose: boolean;
}

const BANNER = `${'='.repeat(20)} SUMMARY ${'='.repeat(20)}`;

function bulletList(items: readonly string[]): string[] {
  return items.map(item => `  - ${item}`);
}

/**
 * Render the end-of-run report printed to stdout
 */
export function formatSummary(summary: RunSummary, options: SummaryOptions): string {
  const lines: string[] = [
    '',
    BANNER,
    `Dry-run mode: ${options.dryRun ? 'ON (no changes were made)' : 'OFF (changes were applied)'}`,
    `Processed NFO files: ${summary.processedFiles}`,
  ];

  const updated = [...new Set(summary.updated)].sort();
  if (updated.length > 0) {
    lines.push('', `--- Items Updated: ${updated.length} ---`);
    if (options.verbose) {
      lines.push(...bulletList(updated));
    }
  } else {
    lines.push('', '--- No items were updated ---');
  }

  if (summary.skipped.length > 0) {
    lines.push('', `--- Skipped Items (${summary.skipped.length}) ---`);
    if (!options.dryRun) {
      lines.push(...bulletList(summary.skipped));
    }
  } else {
    lines.push('', '--- No items were skipped ---');
  }

  if (summary.unsupported.length > 0) {
    lines.push('', `--- Unsupported Fields (${summary.unsupported.length}) ---`);
    lines.push(...bulletList(summary.unsupported));
  }

  if (summary.failed.length > 0) {
    lines.push('', `--- Failed Operations: (${summary.failed.length}) ---`);
    lines.push(...bulletList(summary.failed));
  } else {
    lines.push('', '--- No operations failed ---');
  }

  lines.push('', '='.repeat(50), 'Done.');
  return lines.join('\n');
}
