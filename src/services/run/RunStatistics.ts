/**
 * Run-scoped outcome aggregator
 *
 * One instance is created per run and passed explicitly through the
 * pipeline. Entries are human-readable "label: reason" lines.
 */

import { InvalidStateError } from '../../errors/index.js';

export interface RunSummary {
  readonly processedFiles: number;
  readonly updated: readonly string[];
  readonly skipped: readonly string[];
  readonly unsupported: readonly string[];
  readonly failed: readonly string[];
}

export class RunStatistics {
  private processedFiles = 0;
  private readonly updated: string[] = [];
  private readonly skipped: string[] = [];
  private readonly unsupported: string[] = [];
  private readonly failed: string[] = [];
  private finalized = false;

  incrementProcessed(): void {
    this.assertOpen();
    this.processedFiles++;
  }

  recordUpdated(entry: string): void {
    this.assertOpen();
    this.updated.push(entry);
  }

  recordSkipped(label: string, reason: string): void {
    this.assertOpen();
    this.skipped.push(`${label}: ${reason}`);
  }

  recordUnsupported(label: string, reason: string): void {
    this.assertOpen();
    this.unsupported.push(`${label}: ${reason}`);
  }

  recordFailed(label: string, reason: string): void {
    this.assertOpen();
    this.failed.push(`${label}: ${reason}`);
  }

  /**
   * Freeze the counters and return them. Further records throw.
   */
  finalize(): RunSummary {
    this.finalized = true;
    return this.snapshot();
  }

  snapshot(): RunSummary {
    return Object.freeze({
      processedFiles: this.processedFiles,
      updated: Object.freeze([...this.updated]),
      skipped: Object.freeze([...this.skipped]),
      unsupported: Object.freeze([...this.unsupported]),
      failed: Object.freeze([...this.failed]),
    });
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new InvalidStateError('open', 'finalized', 'Run statistics are already finalized');
    }
  }
}
