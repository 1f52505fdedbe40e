import { isEmptyFeedback, isTruthy, toText } from './feedback.js';
import type { CallScore, FeedbackPayload, SandlerAnalysis, SpinAnalysis } from './schemas/feedback.js';
import { parseTimestamp } from './timestamps.js';
import {
  SKILL_KEYS,
  type AgentAggregate,
  type CallRecord,
  type ObjectionPattern,
  type ObjectionSummary,
  type OutcomeCounts,
  type PatternSource,
  type SkillAverages,
  type SkillKey,
  type SkillScores,
} from './types.js';

export const PROBING_PATTERN = 'Stopped at surface level';

export const emptyOutcomes = (): OutcomeCounts => ({ closed: 0, lost: 0, followUp: 0 });

const emptyScores = (): SkillScores => ({
  overall: [],
  active_listening: [],
  probing_depth: [],
  emotional_intelligence: [],
  value_based_selling: [],
  spin_effectiveness: [],
  sandler_effectiveness: [],
  objection_handling: [],
});

export function tallyOutcome(outcomes: OutcomeCounts, outcome: string | undefined): void {
  if (outcome === 'closed') outcomes.closed += 1;
  else if (outcome === 'lost') outcomes.lost += 1;
  else if (outcome === 'follow-up-scheduled' || outcome === 'needs-callback') outcomes.followUp += 1;
}

/** `overall` reads overall_score, falling back to overall */
export function readScore(callScore: CallScore | undefined, key: SkillKey): number | undefined {
  if (!callScore) return undefined;
  return key === 'overall' ? callScore.overall_score ?? callScore.overall : callScore[key];
}

/**
 * A score of 0 means "not rated" upstream and is left out, so an unscored
 * call does not drag the average down.
 */
export const isRated = (score: number | undefined): score is number =>
  score !== undefined && Number.isFinite(score) && score > 0;

export const average = (values: readonly number[]): number =>
  values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;

/** closed / (closed + lost) as a percentage; follow-ups are undecided and excluded */
export const closeRate = ({ closed, lost }: OutcomeCounts): number =>
  closed + lost > 0 ? (closed / (closed + lost)) * 100 : 0;

const source = (record: CallRecord, timestamp: string | undefined): PatternSource => ({
  date: record.date,
  filename: record.filename,
  timestamp: timestamp ?? '',
  offsetSeconds: parseTimestamp(timestamp),
});

export const shareworthyMoments = (feedback: FeedbackPayload) =>
  (feedback.exceptional_moments ?? []).filter((m) => isTruthy(m.shareworthy));

export const averageScores = (scores: SkillScores): SkillAverages => ({
  overall: average(scores.overall),
  active_listening: average(scores.active_listening),
  probing_depth: average(scores.probing_depth),
  emotional_intelligence: average(scores.emotional_intelligence),
  value_based_selling: average(scores.value_based_selling),
  spin_effectiveness: average(scores.spin_effectiveness),
  sandler_effectiveness: average(scores.sandler_effectiveness),
  objection_handling: average(scores.objection_handling),
});

function summariseObjections(patterns: readonly ObjectionPattern[]): ObjectionSummary {
  return {
    count: patterns.length,
    discountJumps: patterns.filter((p) => p.wentToDiscount).length,
    avgEffectiveness: average(patterns.map((p) => p.effectiveness)),
  };
}

/**
 * Reduce every call belonging to `agentName` into one aggregate.
 *
 * Calls without feedback count towards `totalCalls` only. The result is
 * rebuilt from scratch on every call.
 */
export function aggregateForAgent(records: readonly CallRecord[], agentName: string): AgentAggregate {
  const calls = records.filter((r) => r.agentName === agentName);

  const outcomes = emptyOutcomes();
  const scores = emptyScores();
  const agg: Omit<AgentAggregate, 'averages' | 'closeRate' | 'objectionSummary' | 'implicationCritical'> = {
    agentName,
    totalCalls: calls.length,
    outcomes,
    scores,
    commonStrengths: [],
    commonWeaknesses: [],
    listeningPatterns: [],
    probingPatterns: [],
    emotionalCuePatterns: [],
    objectionPatterns: [],
    spinGaps: { situation: 0, problem: 0, implication: 0, needPayoff: 0 },
    sandlerGaps: { upfrontContract: 0, painDepthSurface: 0, budgetQualified: 0, decisionProcess: 0 },
    exceptionalCount: 0,
  };

  for (const call of calls) {
    const fb = call.feedback;
    if (isEmptyFeedback(fb)) continue;

    tallyOutcome(outcomes, fb.call_outcome);

    for (const key of SKILL_KEYS) {
      const score = readScore(fb.call_score, key);
      if (isRated(score)) scores[key].push(score);
    }

    agg.commonStrengths.push(...(fb.what_went_well ?? []).map(toText));
    agg.commonWeaknesses.push(...(fb.opportunities_to_improve ?? []).map(toText));

    for (const fail of fb.active_listening_failures ?? []) {
      agg.listeningPatterns.push({ ...source(call, fail.timestamp), whatWasMissed: fail.what_was_missed ?? '' });
    }
    for (const miss of fb.missed_probing_opportunities ?? []) {
      agg.probingPatterns.push({
        ...source(call, miss.timestamp),
        pattern: PROBING_PATTERN,
        surfaceAnswer: miss.surface_answer ?? '',
        shouldHaveAsked: miss.should_have_asked ?? '',
      });
    }
    for (const miss of fb.emotional_cues_missed ?? []) {
      agg.emotionalCuePatterns.push({
        ...source(call, miss.timestamp),
        emotion: miss.customer_emotion ?? '',
        acknowledgment: miss.rep_acknowledgment_level ?? 'none',
      });
    }
    for (const obj of fb.objection_handling_analysis ?? []) {
      agg.objectionPatterns.push({
        ...source(call, obj.timestamp),
        objection: obj.objection ?? '',
        effectiveness: obj.effectiveness_rating ?? 0,
        wentToDiscount: isTruthy(obj.went_straight_to_discount),
        valueEstablished: isTruthy(obj.value_established),
      });
    }

    const spin: SpinAnalysis = fb.spin_analysis ?? {};
    if (!isTruthy(spin.situation_questions_used)) agg.spinGaps.situation += 1;
    if (!isTruthy(spin.problem_questions_used)) agg.spinGaps.problem += 1;
    if (!isTruthy(spin.implication_questions_used)) agg.spinGaps.implication += 1;
    if (!isTruthy(spin.need_payoff_questions_used)) agg.spinGaps.needPayoff += 1;

    const sandler: SandlerAnalysis = fb.sandler_analysis ?? {};
    if (!isTruthy(sandler.upfront_contract_established)) agg.sandlerGaps.upfrontContract += 1;
    if (sandler.pain_depth === 'surface') agg.sandlerGaps.painDepthSurface += 1;
    if (!isTruthy(sandler.budget_qualified)) agg.sandlerGaps.budgetQualified += 1;
    if (!isTruthy(sandler.decision_process_identified)) agg.sandlerGaps.decisionProcess += 1;

    agg.exceptionalCount += shareworthyMoments(fb).length;
  }

  return {
    ...agg,
    averages: averageScores(scores),
    closeRate: closeRate(outcomes),
    objectionSummary: summariseObjections(agg.objectionPatterns),
    implicationCritical: agg.totalCalls > 0 && agg.spinGaps.implication > agg.totalCalls * 0.5,
  };
}
