import type { CallRecord } from '@callcoach/analytics';

/** Anything that can produce the full set of call records */
export interface RecordSource {
  /** Short label used in logs */
  readonly name: string;
  load(): Promise<CallRecord[]>;
}

/** A source whose results can be dropped and reloaded on demand */
export interface InvalidatableSource extends RecordSource {
  invalidate(): void;
}

export const isInvalidatable = (source: RecordSource): source is InvalidatableSource =>
  'invalidate' in source && typeof source.invalidate === 'function';

/** One raw row as read from a spreadsheet export or a table */
export type RawRow = Record<string, unknown>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
