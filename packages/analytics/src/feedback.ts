import { FeedbackSchema, type FeedbackPayload } from './schemas/feedback.js';

// spreadsheet exports write these for empty cells
const MISSING_MARKERS = new Set(['nan', 'none', 'null', 'n/a', 'undefined']);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Remove one leading ``` / ```json fence and its closing fence */
export function stripCodeFence(text: string): string {
  let body = text.trim();
  if (!body.startsWith('```')) return body;

  body = body.slice(3);
  if (body.slice(0, 4).toLowerCase() === 'json') body = body.slice(4);

  const close = body.lastIndexOf('```');
  if (close !== -1) body = body.slice(0, close);
  return body.trim();
}

/**
 * Parse one raw `feedback_json` cell into a validated payload.
 *
 * Absent, blank, malformed or non-object input yields `{}`; this never throws.
 */
export function parseFeedback(raw: unknown): FeedbackPayload {
  if (typeof raw !== 'string') return {};

  const trimmed = raw.trim();
  if (!trimmed || MISSING_MARKERS.has(trimmed.toLowerCase())) return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(trimmed));
  } catch {
    return {};
  }
  if (!isRecord(decoded)) return {};

  const result = FeedbackSchema.safeParse(decoded);
  return result.success ? result.data : {};
}

/** Truthiness of a behaviour flag; empty arrays and objects count as unset */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export const isEmptyFeedback = (feedback: FeedbackPayload): boolean =>
  Object.keys(feedback).length === 0;

/** Text form of a strength/weakness entry; `{ text }` objects use their text */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (isRecord(value)) return typeof value.text === 'string' ? value.text : JSON.stringify(value);
  if (Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}
