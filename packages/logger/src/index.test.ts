import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, defaultLevel, formatPretty, redact, registerTransport, type LogEntry } from './index.js';

describe('redact', () => {
  it('masks sensitive keys', () => {
    expect(
      redact({ apiKey: 'test-secret', connectionString: 'postgres://x', count: 3, authorization: 'Bearer x' }),
    ).toEqual({ apiKey: '[REDACTED]', connectionString: '[REDACTED]', count: 3, authorization: '[REDACTED]' });
  });
});

describe('defaultLevel', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads CALLCOACH_LOG_LEVEL', () => {
    vi.stubEnv('CALLCOACH_LOG_LEVEL', 'WARN');
    expect(defaultLevel()).toBe('warn');
  });

  it('ignores unknown levels', () => {
    vi.stubEnv('CALLCOACH_LOG_LEVEL', 'toString');
    vi.stubEnv('NODE_ENV', 'production');
    expect(defaultLevel()).toBe('info');
  });
});

describe('Logger', () => {
  afterEach(() => {
    globalThis.__callcoach_cli_mode = undefined;
  });

  it('sends entries at or above the level to transports, redacted', () => {
    globalThis.__callcoach_cli_mode = true;
    const seen: LogEntry[] = [];
    const logger = createLogger('records', 'info');
    logger.addTransport({ send: (e) => seen.push(e) });

    logger.debug('hidden');
    logger.info('Loaded call records', { count: 2, token: 'test-secret' });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      level: 'info',
      component: 'records',
      message: 'Loaded call records',
      attributes: { count: 2, token: '[REDACTED]' },
    });
  });

  it('prefixes child components and keeps transports', () => {
    globalThis.__callcoach_cli_mode = true;
    const seen: LogEntry[] = [];
    const parent = createLogger('api', 'debug');
    parent.addTransport({ send: (e) => seen.push(e) });

    parent.child('server').warn('slow');

    expect(seen.map((e) => e.component)).toEqual(['api:server']);
  });

  it('feeds registered transports until unregistered', () => {
    globalThis.__callcoach_cli_mode = true;
    const seen: string[] = [];
    const unregister = registerTransport({ send: (e) => seen.push(e.message) });
    const logger = createLogger('cli', 'debug');

    logger.info('one');
    unregister();
    logger.info('two');

    expect(seen).toEqual(['one']);
  });

  it('writes only warnings and errors to stderr in CLI mode', () => {
    globalThis.__callcoach_cli_mode = true;
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger('cli', 'debug');

    logger.info('quiet');
    logger.error('Could not load records');

    expect(write.mock.calls).toEqual([['Could not load records\n']]);
  });

  it('keeps logging when a transport throws', () => {
    globalThis.__callcoach_cli_mode = true;
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger('cli', 'debug');
    logger.addTransport({
      send: () => {
        throw new Error('offline');
      },
    });

    logger.info('still here');

    expect(write).toHaveBeenCalledWith('log transport failed: offline\n');
  });
});

describe('formatPretty', () => {
  it('renders level, component and attributes', () => {
    expect(
      formatPretty({
        level: 'info',
        message: 'ready',
        component: 'api',
        timestamp: '2026-10-12T08:00:00.000Z',
        attributes: { port: 3000 },
      }),
    ).toBe('2026-10-12T08:00:00.000Z INFO  [api] ready {"port":3000}');
  });
});
