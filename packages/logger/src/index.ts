export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

declare global {
  // eslint-disable-next-line no-var
  var __callcoach_cli_mode: boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  component: string;
  timestamp: string;
  attributes?: Record<string, unknown>;
}

export interface Transport {
  send(entry: LogEntry): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = /key|secret|token|password|authorization|cookie|dsn|connection.?string/i;

// transports registered here receive entries from every logger
const sharedTransports: Transport[] = [];

export function registerTransport(transport: Transport): () => void {
  sharedTransports.push(transport);
  return () => {
    const idx = sharedTransports.indexOf(transport);
    if (idx !== -1) sharedTransports.splice(idx, 1);
  };
}

export function redact(attrs: Record<string, unknown>): Record<string, unknown> {
  const clean: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(attrs)) {
    clean[k] = SENSITIVE_KEYS.test(k) ? '[REDACTED]' : v;
  }
  return clean;
}

const isProd = () => process.env.NODE_ENV === 'production';

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);

/** Level from CALLCOACH_LOG_LEVEL, else info in production and debug elsewhere */
export function defaultLevel(): LogLevel {
  const fromEnv = process.env.CALLCOACH_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return isProd() ? 'info' : 'debug';
}

export function formatPretty(entry: LogEntry): string {
  const tag = entry.component ? `[${entry.component}]` : '';
  const attrs = entry.attributes && Object.keys(entry.attributes).length
    ? ` ${JSON.stringify(entry.attributes)}`
    : '';
  return `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${tag} ${entry.message}${attrs}`;
}

export class Logger {
  private component: string;
  private minLevel: LogLevel;
  private transports: Transport[] = [];

  constructor(component: string, minLevel?: LogLevel) {
    this.component = component;
    this.minLevel = minLevel ?? defaultLevel();
  }

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      component: this.component,
      timestamp: new Date().toISOString(),
      attributes: attributes ? redact(attributes) : undefined,
    };

    // CLI mode: warnings and errors only, as plain text on stderr
    if (globalThis.__callcoach_cli_mode) {
      if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) process.stderr.write(`${message}\n`);
    } else if (isProd()) {
      process.stdout.write(JSON.stringify(entry) + '\n');
    } else {
      // eslint-disable-next-line no-console
      console.log(formatPretty(entry));
    }

    for (const t of [...this.transports, ...sharedTransports]) {
      try {
        t.send(entry);
      } catch (err: unknown) {
        process.stderr.write(`log transport failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log('debug', message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log('info', message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log('warn', message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log('error', message, attributes);
  }

  child(component: string): Logger {
    const child = new Logger(`${this.component}:${component}`, this.minLevel);
    child.transports = [...this.transports];
    return child;
  }
}

export function createLogger(component: string, minLevel?: LogLevel): Logger {
  return new Logger(component, minLevel);
}

export { PostHogTransport } from './posthog.js';
export type { PostHogTransportConfig } from './posthog.js';
