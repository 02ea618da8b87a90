import { DEFAULT_ACTIVITY_LOG_CAPACITY, type ConversionRecord } from '@fxconvert/domain';
import type { ServiceLogger } from '@fxconvert/observability';

export interface ActivityLogOptions {
  /** Most recent entries kept in memory. */
  capacity?: number;
}

/**
 * Append-only history of this process's conversions, reported by a
 * background drain.
 *
 * `append` replaces the history array instead of mutating it, so a snapshot
 * handed out earlier never changes underneath its reader. Reporting runs on
 * a later macrotask and never holds up the caller.
 */
export class ConversionActivityLog {
  private entries: readonly ConversionRecord[] = [];
  private pending: Array<{ record: ConversionRecord; historySize: number }> = [];
  private draining: Promise<void> | null = null;
  private readonly capacity: number;

  constructor(
    private readonly logger: ServiceLogger,
    options: ActivityLogOptions = {}
  ) {
    this.capacity = options.capacity ?? DEFAULT_ACTIVITY_LOG_CAPACITY;
  }

  append(record: ConversionRecord): void {
    const next = [...this.entries, record];
    this.entries = Object.freeze(next.length > this.capacity ? next.slice(next.length - this.capacity) : next);
    this.pending.push({ record, historySize: this.entries.length });

    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  snapshot(): readonly ConversionRecord[] {
    return this.entries;
  }

  /** Resolves once every appended entry has been reported. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drain(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));

    try {
      while (this.pending.length > 0) {
        const batch = this.pending;
        this.pending = [];
        for (const { record, historySize } of batch) {
          this.logger.info('conversion logged', {
            amount: record.amount,
            from: record.from,
            to: record.to,
            result: record.result,
            convertedAt: record.convertedAt.toISOString(),
            historySize
          });
        }
      }
    } finally {
      this.draining = null;
    }
  }
}
