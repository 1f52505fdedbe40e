// Sources
export { CsvRecordSource, parseCsvRecords, sheetExportUrl } from './providers/csv.js';
export type { CsvRecordSourceOptions } from './providers/csv.js';
export { PostgresRecordSource } from './providers/postgres.js';
export type { PostgresRecordSourceOptions, QueryablePool } from './providers/postgres.js';
export { MemoryRecordSource } from './providers/memory.js';

// Cache
export { CachedRecordSource, DEFAULT_TTL_MS } from './cache.js';
export type { CachedRecordSourceOptions } from './cache.js';

// Rows
export { normaliseRow, normaliseHeader, RECORD_COLUMNS } from './normalize.js';

// Errors & types
export { RecordSourceError, type RecordSourceErrorCode } from './errors.js';
export { isInvalidatable } from './types.js';
export type { RecordSource, InvalidatableSource, RawRow, FetchFn } from './types.js';
