import type { PostHog as PostHogClient } from 'posthog-node';
import type { Transport, LogEntry, LogLevel } from './index.js';

export interface PostHogTransportConfig {
  apiKey: string;
  host?: string;
  /** Entries below this level are not shipped. Defaults to warn. */
  minLevel?: LogLevel;
  /** Identifies the install sending events; defaults to "callcoach" */
  distinctId?: string;
}

const SHIPPED: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Ships log entries to PostHog as `log:<level>` events. */
export class PostHogTransport implements Transport {
  private client: PostHogClient | null = null;
  private config: PostHogTransportConfig;

  constructor(config: PostHogTransportConfig) {
    this.config = config;
  }

  private async getClient(): Promise<PostHogClient> {
    if (!this.client) {
      const { PostHog } = await import('posthog-node');
      this.client = new PostHog(this.config.apiKey, {
        host: this.config.host ?? 'https://us.i.posthog.com',
        flushAt: 20,
        flushInterval: 10000,
      });
    }
    return this.client;
  }

  send(entry: LogEntry): void {
    if (SHIPPED[entry.level] < SHIPPED[this.config.minLevel ?? 'warn']) return;

    this.getClient().then((client) => {
      client.capture({
        distinctId: this.config.distinctId ?? 'callcoach',
        event: `log:${entry.level}`,
        properties: {
          ...entry.attributes,
          message: entry.message,
          component: entry.component,
          timestamp: entry.timestamp,
          level: entry.level,
        },
      });
    }).catch((err: unknown) => {
      process.stderr.write(`posthog transport unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
    });
  }

  async shutdown(): Promise<void> {
    await this.client?.shutdown();
  }
}
