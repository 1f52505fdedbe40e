import * as Sentry from '@sentry/node';
import { describe, expect, it, vi } from 'vitest';

import { SentryTransport } from './sentry.js';

const scope = vi.hoisted(() => ({ setTag: vi.fn(), setExtra: vi.fn() }));

vi.mock('@sentry/node', () => ({
  withScope: vi.fn((fn: (s: typeof scope) => void) => fn(scope)),
  captureMessage: vi.fn(),
}));

const entry = (level: 'warn' | 'error') => ({
  level,
  message: 'query failed',
  component: 'records:postgres',
  timestamp: '2026-10-12T10:00:00.000Z',
  attributes: { table: 'calls' },
});

describe('SentryTransport', () => {
  it('forwards error entries with their component and attributes', () => {
    new SentryTransport().send(entry('error'));

    expect(scope.setTag).toHaveBeenCalledWith('component', 'records:postgres');
    expect(scope.setExtra).toHaveBeenCalledWith('table', 'calls');
    expect(Sentry.captureMessage).toHaveBeenCalledWith('query failed', 'error');
  });

  it('ignores lower levels', () => {
    new SentryTransport().send(entry('warn'));
    expect(Sentry.withScope).not.toHaveBeenCalled();
  });
});
