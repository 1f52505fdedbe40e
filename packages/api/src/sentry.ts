import type { LogEntry, Transport } from '@callcoach/logger';
import * as Sentry from '@sentry/node';

/** Forwards error-level log entries to Sentry as messages */
export class SentryTransport implements Transport {
  send(entry: LogEntry): void {
    if (entry.level !== 'error') return;

    Sentry.withScope((scope) => {
      scope.setTag('component', entry.component);
      for (const [k, v] of Object.entries(entry.attributes ?? {})) {
        scope.setExtra(k, v);
      }
      Sentry.captureMessage(entry.message, 'error');
    });
  }
}
