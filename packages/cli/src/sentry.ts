import { createLogger } from '@callcoach/logger';

import { errorMessage } from './errors.js';

const logger = createLogger('cli:sentry');

let Sentry: typeof import('@sentry/node') | null = null;
let initialized = false;

const SENSITIVE_KEYS = ['posthogKey', 'apiKey', 'token', 'password', 'connectionString', 'url'];

export async function initSentry(): Promise<void> {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn || process.argv.includes('--no-telemetry')) return;

  try {
    Sentry = await import('@sentry/node');
  } catch (err: unknown) {
    logger.debug('Sentry unavailable', { reason: errorMessage(err) });
    return;
  }

  Sentry.init({
    dsn,
    release: process.env.npm_package_version ?? '0.1.0',
    environment: process.env.NODE_ENV ?? 'production',
    beforeSend(event) {
      // scrub sensitive data from extras
      if (event.extra) {
        for (const key of SENSITIVE_KEYS) delete event.extra[key];
      }
      if (event.breadcrumbs) {
        for (const bc of event.breadcrumbs) {
          if (bc.data) {
            for (const key of SENSITIVE_KEYS) delete bc.data[key];
          }
        }
      }
      return event;
    },
  });
  initialized = true;
}

export function captureError(err: unknown, context?: { command?: string; category?: string }): void {
  if (!initialized || !Sentry) return;
  Sentry.captureException(err, {
    tags: {
      command: context?.command ?? 'unknown',
      category: context?.category ?? categorize(err),
    },
  });
}

export function categorize(err: unknown): string {
  if (!(err instanceof Error)) return 'unknown';
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  if (code === 'INVALID_CONFIG' || code === 'NO_SOURCE') return 'config';
  if (code === 'FETCH_FAILED' || code === 'QUERY_FAILED') return 'network';
  if (code === 'PARSE_FAILED') return 'data';
  const msg = err.message.toLowerCase();
  if (msg.includes('not configured') || msg.includes('missing') || msg.includes('invalid')) return 'config';
  if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('fetch')) return 'network';
  return 'unknown';
}
