import {
  CachedRecordSource,
  CsvRecordSource,
  PostgresRecordSource,
  type RecordSource,
} from '@callcoach/records';

import type { Settings } from './config.js';
import { CliError } from './errors.js';

const isUrl = (value: string): boolean => /^https?:\/\//i.test(value);

/** Build the cached record source described by the settings */
export function createSource(settings: Settings): RecordSource {
  const { type, location, table } = settings.source;
  if (!location) {
    throw new CliError(
      'NO_SOURCE',
      type === 'postgres'
        ? 'no database configured; set DATABASE_URL or source.url'
        : 'no call records configured; pass --source <csv path or url> or run `callcoach config set source.url <url>`',
    );
  }

  const inner: RecordSource =
    type === 'postgres'
      ? new PostgresRecordSource({ connectionString: location, table })
      : new CsvRecordSource(isUrl(location) ? { url: location } : { path: location });

  return new CachedRecordSource(inner, { ttlMs: settings.cacheTtlMs });
}
