const DIGITS = /^\d+$/;

/**
 * Convert a feedback timestamp (`MM:SS`, `HH:MM:SS` or a bare number of
 * seconds) into whole seconds. Unrecognised values become 0.
 */
export function parseTimestamp(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
  if (typeof value !== 'string') return 0;

  const ts = value.trim();
  if (!ts) return 0;

  if (ts.includes(':')) {
    const parts = ts.split(':');
    if (!parts.every((p) => DIGITS.test(p))) return 0;
    const [a, b, c] = parts.map(Number);
    if (parts.length === 2) return a * 60 + b;
    if (parts.length === 3) return a * 3600 + b * 60 + c;
    return 0;
  }

  const seconds = Number(ts);
  return Number.isFinite(seconds) && seconds > 0 ? Math.trunc(seconds) : 0;
}

/** Render whole seconds as `M:SS`, or `H:MM:SS` past the hour */
export function formatOffset(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = String(total % 60).padStart(2, '0');
  return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${s}` : `${m}:${s}`;
}
