import { errorMessage } from './errors.js';
import { error } from './output.js';
import { captureError } from './sentry.js';

// format seconds into human-readable duration (e.g. "3m 05s", "1h 23m")
export const formatDuration = (seconds?: number): string => {
  if (!seconds) return '—';
  const whole = Math.round(seconds);
  if (whole < 60) return `${whole}s`;
  const m = Math.floor(whole / 60);
  const s = whole % 60;
  if (m < 60) return `${m}m ${String(s).padStart(2, '0')}s`;
  const h = Math.floor(m / 60);
  return `${h}h ${m % 60}m`;
};

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

export const formatScore = (value: number): string => (value > 0 ? `${value.toFixed(1)}/10` : '—');

// snake_case keys to words: "active_listening" -> "active listening"
export const humanize = (key: string): string => key.replace(/[_-]+/g, ' ');

/** Pad cells into aligned columns; the last column is not padded */
export const table = (rows: readonly (readonly string[])[]): string[] => {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i])))
      .join('  ')
      .trimEnd(),
  );
};

/** Report a failed command and mark the process as failed */
export const fail = (err: unknown, command: string): void => {
  captureError(err, { command });
  error(errorMessage(err));
  process.exitCode = 1;
};
