import { isRecord, toText } from './feedback.js';
import { readScore } from './aggregate.js';
import { parseTimestamp } from './timestamps.js';
import type { CallRecord } from './types.js';

export type MomentKind = 'listening' | 'probing' | 'emotion' | 'objection';

export interface CoachingMoment {
  kind: MomentKind;
  timestamp: string;
  offsetSeconds: number;
  /** What happened on the call */
  observed: string;
  /** What the rep should have done instead */
  better: string;
}

export interface CallReview {
  agentName: string;
  filename: string;
  date: string;
  outcome: string;
  summary: string;
  customerIntent: string;
  closeReason: string;
  overallScore: number | null;
  disposition: string | null;
  reachedCreditCard: boolean;
  callDuration: number | null;
  audioUrl: string | null;
  /** Coaching moments ordered by offset into the call */
  moments: CoachingMoment[];
  wentWell: string[];
  toImprove: string[];
  samplePhrases: Record<string, string[]>;
}

const moment = (kind: MomentKind, timestamp: string | undefined, observed: string | undefined, better: string | undefined): CoachingMoment => ({
  kind,
  timestamp: timestamp ?? '',
  offsetSeconds: parseTimestamp(timestamp),
  observed: observed ?? '',
  better: better ?? '',
});

function phrases(raw: unknown): Record<string, string[]> {
  if (!isRecord(raw)) return {};
  const out: Record<string, string[]> = {};
  for (const [group, list] of Object.entries(raw)) {
    if (!Array.isArray(list)) continue;
    const items = list.map(toText).filter(Boolean);
    if (items.length) out[group] = items;
  }
  return out;
}

/** Per-call coaching breakdown. Calls without feedback get empty sections. */
export function buildCallReview(record: CallRecord): CallReview {
  const fb = record.feedback;
  const disposition = record.disposition?.trim() || null;

  const moments: CoachingMoment[] = [
    ...(fb.active_listening_failures ?? []).map((f) =>
      moment('listening', f.timestamp, f.what_was_missed ?? f.customer_said, f.better_response),
    ),
    ...(fb.missed_probing_opportunities ?? []).map((m) =>
      moment('probing', m.timestamp, m.surface_answer, m.should_have_asked),
    ),
    ...(fb.emotional_cues_missed ?? []).map((m) =>
      moment('emotion', m.timestamp, m.customer_emotion, m.empathy_response),
    ),
    ...(fb.objection_handling_analysis ?? []).map((o) =>
      moment('objection', o.timestamp, o.objection, o.sandler_technique_recommended),
    ),
  ].sort((a, b) => a.offsetSeconds - b.offsetSeconds);

  const overall = readScore(fb.call_score, 'overall');

  return {
    agentName: record.agentName,
    filename: record.filename,
    date: record.date,
    outcome: fb.call_outcome ?? 'unknown',
    summary: fb.summary ?? '',
    customerIntent: fb.customer_intent ?? '',
    closeReason: fb.close_reason ?? '',
    overallScore: overall ?? null,
    disposition,
    reachedCreditCard: disposition !== null && disposition.toLowerCase().includes('credit card'),
    callDuration: record.callDuration ?? null,
    audioUrl: record.audioUrl ?? null,
    moments,
    wentWell: (fb.what_went_well ?? []).map(toText),
    toImprove: (fb.opportunities_to_improve ?? []).map(toText),
    samplePhrases: phrases(fb.sample_phrases),
  };
}

/** First record whose filename matches, case-insensitively */
export function findCall(records: readonly CallRecord[], filename: string): CallRecord | undefined {
  const wanted = filename.trim().toLowerCase();
  return records.find((r) => r.filename.toLowerCase() === wanted);
}
