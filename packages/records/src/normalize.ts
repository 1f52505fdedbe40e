import { parseFeedback, type CallRecord } from '@callcoach/analytics';

import type { RawRow } from './types.js';

export const RECORD_COLUMNS = [
  'agent_name',
  'date',
  'filename',
  'transcript',
  'disposition',
  'call_duration',
  'audio_url',
  'feedback_json',
] as const;

const MISSING = new Set(['', 'nan', 'none', 'null', 'n/a', 'undefined']);

/** `Agent Name`, `agent-name` and `AGENT_NAME` all become `agent_name` */
export const normaliseHeader = (header: string): string =>
  header.trim().toLowerCase().replace(/[\s-]+/g, '_');

function cell(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  const text = String(value).trim();
  return MISSING.has(text.toLowerCase()) ? undefined : text;
}

function duration(value: unknown): number | undefined {
  const text = cell(value);
  if (text === undefined) return undefined;
  const seconds = Number(text);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Map one raw row onto a CallRecord. Header spelling is normalised first;
 * missing text columns become empty strings and feedback is parsed leniently.
 */
export function normaliseRow(row: RawRow): CallRecord {
  const get = (column: (typeof RECORD_COLUMNS)[number]): unknown => {
    for (const [key, value] of Object.entries(row)) {
      if (normaliseHeader(key) === column) return value;
    }
    return undefined;
  };

  return {
    agentName: cell(get('agent_name')) ?? '',
    date: cell(get('date')) ?? '',
    filename: cell(get('filename')) ?? '',
    transcript: cell(get('transcript')) ?? '',
    disposition: cell(get('disposition')),
    callDuration: duration(get('call_duration')),
    audioUrl: cell(get('audio_url')),
    feedback: parseFeedback(get('feedback_json')),
  };
}
