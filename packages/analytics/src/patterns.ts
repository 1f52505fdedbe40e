import { shareworthyMoments } from './aggregate.js';
import { parseTimestamp } from './timestamps.js';
import type { AgentCount, CallRecord } from './types.js';

export interface PatternCount {
  key: string;
  count: number;
}

export type PatternKey<T> = keyof T | ((item: T) => unknown);

const keyOf = <T>(item: T, key: PatternKey<T>): string => {
  const raw = typeof key === 'function' ? key(item) : item[key];
  if (typeof raw === 'string') return raw.trim();
  if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
  return '';
};

/**
 * Count items by `key` and rank them, most frequent first. Ties keep the
 * order in which keys were first seen; blank keys are not counted.
 *
 * Keys are trimmed before grouping, so `" budget "` and `"budget"` count as
 * one pattern reported under the trimmed text.
 */
export function rankPatterns<T>(items: readonly T[], key: PatternKey<T>, topN?: number): PatternCount[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = keyOf(item, key);
    if (!k) continue;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }

  const ranked = [...counts].map(([k, count]) => ({ key: k, count })).sort((a, b) => b.count - a.count);
  return topN === undefined ? ranked : ranked.slice(0, Math.max(0, topN));
}

export interface MomentView {
  category: string;
  timestamp: string;
  offsetSeconds: number;
  customerQuote: string;
  repQuote: string;
  whatHappened: string;
  whyExceptional: string;
  coachingInsight?: string;
}

export interface ShareworthyCall {
  agentName: string;
  filename: string;
  date: string;
  outcome: string;
  moments: MomentView[];
}

/** Calls with at least one moment flagged shareworthy, in record order */
export function collectShareworthyMoments(records: readonly CallRecord[]): ShareworthyCall[] {
  const feed: ShareworthyCall[] = [];
  for (const record of records) {
    const moments = shareworthyMoments(record.feedback);
    if (!moments.length) continue;

    feed.push({
      agentName: record.agentName,
      filename: record.filename,
      date: record.date,
      outcome: record.feedback.call_outcome ?? 'unknown',
      moments: moments.map((m) => ({
        category: m.category ?? 'general',
        timestamp: m.timestamp ?? '',
        offsetSeconds: parseTimestamp(m.timestamp),
        customerQuote: m.customer_quote ?? '',
        repQuote: m.rep_quote ?? '',
        whatHappened: m.what_happened ?? '',
        whyExceptional: m.why_exceptional ?? '',
        coachingInsight: m.coaching_insight,
      })),
    });
  }
  return feed;
}

/** Agents ranked by shareworthy moments in `category` */
export function rankAgentsByCategory(records: readonly CallRecord[], category: string, topN = 3): AgentCount[] {
  const owners: string[] = [];
  for (const record of records) {
    if (!record.agentName) continue;
    for (const moment of shareworthyMoments(record.feedback)) {
      if ((moment.category ?? 'general') === category) owners.push(record.agentName);
    }
  }
  return rankPatterns(owners, (agent) => agent, topN).map(({ key, count }) => ({ agentName: key, count }));
}
