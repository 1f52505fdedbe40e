import { describe, expect, it, vi } from 'vitest';

import { RecordSourceError } from '../errors.js';
import { PostgresRecordSource, type QueryablePool } from './postgres.js';

const fakePool = (rows: Record<string, unknown>[]) => ({
  query: vi.fn(async (_text: string) => ({ rows })),
  end: vi.fn(async () => undefined),
});

describe('PostgresRecordSource', () => {
  it('selects the record columns and normalises rows', async () => {
    const pool = fakePool([
      { agent_name: 'Alex', date: new Date(Date.UTC(2026, 9, 12)), filename: 'a.wav', transcript: 'Hi', call_duration: 90, feedback_json: '{"summary":"ok"}' },
    ]);
    const source = new PostgresRecordSource({ pool, table: 'analytics.calls' });

    const records = await source.load();

    expect(pool.query).toHaveBeenCalledWith(
      'SELECT agent_name, date, filename, transcript, disposition, call_duration, audio_url, feedback_json FROM "analytics"."calls" ORDER BY date',
    );
    expect(records).toEqual([
      {
        agentName: 'Alex',
        date: '2026-10-12T00:00:00.000Z',
        filename: 'a.wav',
        transcript: 'Hi',
        disposition: undefined,
        callDuration: 90,
        audioUrl: undefined,
        feedback: { summary: 'ok' },
      },
    ]);
  });

  it('wraps query failures', async () => {
    const pool: QueryablePool = {
      query: async () => {
        throw new Error('relation "call_records" does not exist');
      },
      end: async () => undefined,
    };

    await expect(new PostgresRecordSource({ pool }).load()).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Query failed: relation "call_records" does not exist',
    });
  });

  it('rejects unsafe table names', () => {
    expect(() => new PostgresRecordSource({ pool: fakePool([]), table: 'calls; DROP TABLE x' })).toThrowError(
      RecordSourceError,
    );
  });

  it('needs a pool or a connection string', () => {
    expect(() => new PostgresRecordSource({})).toThrowError('PostgresRecordSource needs a connectionString or a pool');
  });

  it('closes the pool', async () => {
    const pool = fakePool([]);
    const source = new PostgresRecordSource({ pool });
    await source.close();
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
