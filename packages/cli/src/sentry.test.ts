import { RecordSourceError } from '@callcoach/records';
import { describe, expect, it } from 'vitest';

import { CliError } from './errors.js';
import { categorize } from './sentry.js';

describe('categorize', () => {
  it('uses the error code first', () => {
    expect(categorize(new CliError('NO_SOURCE', 'nothing here'))).toBe('config');
    expect(categorize(new RecordSourceError('FETCH_FAILED', 'CSV export returned 500'))).toBe('network');
    expect(categorize(new RecordSourceError('PARSE_FAILED', 'bad row'))).toBe('data');
  });

  it('falls back to the message', () => {
    expect(categorize(new Error('Invalid table name'))).toBe('config');
    expect(categorize(new Error('connect ECONNREFUSED 127.0.0.1:5432'))).toBe('network');
    expect(categorize(new Error('something else'))).toBe('unknown');
    expect(categorize('not an error')).toBe('unknown');
  });
});
