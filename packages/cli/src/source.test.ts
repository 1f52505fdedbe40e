import { describe, expect, it } from 'vitest';

import type { Settings } from './config.js';
import { CliError } from './errors.js';
import { createSource } from './source.js';

const settings = (source: Settings['source']): Settings => ({
  source,
  cacheTtlMs: 60_000,
  server: { port: 3000, host: '127.0.0.1' },
});

describe('createSource', () => {
  it('wraps a CSV file in a cache', () => {
    expect(createSource(settings({ type: 'csv', location: './calls.csv' })).name).toBe('cached:csv:file');
  });

  it('treats http locations as CSV exports', () => {
    expect(createSource(settings({ type: 'csv', location: 'https://example.com/calls.csv' })).name).toBe('cached:csv:url');
  });

  it('builds a postgres source', () => {
    const source = createSource(settings({ type: 'postgres', location: 'postgres://localhost/calls', table: 'calls' }));
    expect(source.name).toBe('cached:postgres');
  });

  it('fails when nothing is configured', () => {
    expect(() => createSource(settings({ type: 'csv' }))).toThrowError(CliError);
    expect(() => createSource(settings({ type: 'postgres' }))).toThrowError(
      'no database configured; set DATABASE_URL or source.url',
    );
  });
});
