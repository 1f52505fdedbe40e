import type { CallRecord } from '@callcoach/analytics';

import type { RecordSource } from '../types.js';

/** In-memory record source, useful for tests and embedding */
export class MemoryRecordSource implements RecordSource {
  readonly name = 'memory';
  private records: CallRecord[];

  constructor(records: CallRecord[] = []) {
    this.records = [...records];
  }

  async load(): Promise<CallRecord[]> {
    return [...this.records];
  }

  replace(records: CallRecord[]): void {
    this.records = [...records];
  }
}
