import type { CallRecord } from '@callcoach/analytics';
import { createLogger } from '@callcoach/logger';

import type { InvalidatableSource, RecordSource } from './types.js';

const logger = createLogger('records:cache');

export const DEFAULT_TTL_MS = 60_000;

export interface CachedRecordSourceOptions {
  ttlMs?: number;
  /** Clock in milliseconds; tests pass a fake */
  now?: () => number;
}

/**
 * Wraps a source and reuses its last result until the TTL lapses.
 * Concurrent loads share one in-flight request; a failed load is not cached.
 */
export class CachedRecordSource implements InvalidatableSource {
  readonly name: string;
  private source: RecordSource;
  private ttlMs: number;
  private now: () => number;
  private cached: { records: CallRecord[]; loadedAt: number } | null = null;
  private pending: Promise<CallRecord[]> | null = null;
  private generation = 0;

  constructor(source: RecordSource, options: CachedRecordSourceOptions = {}) {
    this.source = source;
    this.name = `cached:${source.name}`;
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_TTL_MS);
    this.now = options.now ?? Date.now;
  }

  async load(): Promise<CallRecord[]> {
    if (this.cached && this.now() - this.cached.loadedAt < this.ttlMs) {
      return this.cached.records;
    }
    if (!this.pending) {
      const pending: Promise<CallRecord[]> = this.refresh().finally(() => {
        if (this.pending === pending) this.pending = null;
      });
      this.pending = pending;
    }
    return this.pending;
  }

  invalidate(): void {
    this.cached = null;
    this.pending = null;
    this.generation += 1;
    logger.debug('Cache invalidated', { source: this.source.name });
  }

  private async refresh(): Promise<CallRecord[]> {
    const generation = this.generation;
    const records = await this.source.load();
    // a load that started before invalidate() must not repopulate the cache
    if (generation === this.generation) this.cached = { records, loadedAt: this.now() };
    return records;
  }
}
