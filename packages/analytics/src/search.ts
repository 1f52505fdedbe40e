import type { CallRecord } from './types.js';

export interface SearchHit {
  agentName: string;
  filename: string;
  date: string;
  summary: string;
  excerpt: string;
  /** True when the transcript was cut to fit the excerpt */
  truncated: boolean;
}

export interface SearchOptions {
  excerptLength?: number;
}

/**
 * Case-insensitive substring search over call transcripts. Hits keep record
 * order; a blank keyword matches nothing.
 */
export function searchTranscripts(
  records: readonly CallRecord[],
  keyword: string,
  { excerptLength = 300 }: SearchOptions = {},
): SearchHit[] {
  const needle = keyword.trim().toLowerCase();
  if (!needle) return [];

  return records
    .filter((r) => r.transcript.toLowerCase().includes(needle))
    .map((r) => ({
      agentName: r.agentName,
      filename: r.filename,
      date: r.date,
      summary: r.feedback.summary ?? '',
      excerpt: r.transcript.slice(0, Math.max(0, excerptLength)),
      truncated: r.transcript.length > excerptLength,
    }));
}
