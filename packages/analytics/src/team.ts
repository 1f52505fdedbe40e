import {
  aggregateForAgent,
  average,
  closeRate,
  emptyOutcomes,
  isRated,
  readScore,
  tallyOutcome,
} from './aggregate.js';
import { isEmptyFeedback } from './feedback.js';
import { rankAgentsByCategory } from './patterns.js';
import type {
  AgentCount,
  AgentPerformance,
  CallRecord,
  FocusArea,
  LeaderboardRow,
  Recommendation,
  SpotlightCategory,
  TeamAggregate,
  Tiers,
} from './types.js';

export const TIER_THRESHOLDS = { top: 7, developing: 5 } as const;

/** Share of all calls a failure type may reach before team training is recommended */
export const TEAM_TRAINING_THRESHOLDS: Record<FocusArea, number> = {
  active_listening: 0.3,
  probing: 0.4,
  discounting: 0.2,
};

// per-agent totals above which a needs-support agent gets a focus area
const FOCUS_LIMITS: Record<FocusArea, number> = {
  active_listening: 3,
  probing: 3,
  discounting: 2,
};

const TRAINING_MESSAGES: Record<FocusArea, string> = {
  active_listening: 'Active listening workshop: listening failures in over 30% of calls',
  probing: 'SPIN selling refresher: agents stopping at surface answers',
  discounting: 'Value-based selling training: too many reps jumping to discounts',
};

const FOCUS_AREAS: readonly FocusArea[] = ['active_listening', 'probing', 'discounting'];

const TRIAGE_SIZE = 3;

/** Distinct non-blank agent names in first-seen order */
export function listAgents(records: readonly CallRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    if (record.agentName) seen.add(record.agentName);
  }
  return [...seen];
}

function performanceFor(records: readonly CallRecord[], agentName: string): AgentPerformance {
  const agg = aggregateForAgent(records, agentName);
  return {
    agentName,
    totalCalls: agg.totalCalls,
    closed: agg.outcomes.closed,
    lost: agg.outcomes.lost,
    followUp: agg.outcomes.followUp,
    closeRate: agg.closeRate,
    avgScore: agg.averages.overall,
    scoredCalls: agg.scores.overall.length,
    listeningFails: agg.listeningPatterns.length,
    probingFails: agg.probingPatterns.length,
    emotionalFails: agg.emotionalCuePatterns.length,
    objectionCount: agg.objectionPatterns.length,
    discountCount: agg.objectionSummary.discountJumps,
    exceptionalCount: agg.exceptionalCount,
  };
}

const metricFor: Record<FocusArea, (p: AgentPerformance) => number> = {
  active_listening: (p) => p.listeningFails,
  probing: (p) => p.probingFails,
  discounting: (p) => p.discountCount,
};

/** Agents with a non-zero count, highest first; ties keep agent order */
function triage(agents: readonly AgentPerformance[], area: FocusArea): AgentCount[] {
  return agents
    .map((p) => ({ agentName: p.agentName, count: metricFor[area](p) }))
    .filter((row) => row.count > 0)
    .sort((a, b) => b.count - a.count)
    .slice(0, TRIAGE_SIZE);
}

function focusAreas(p: AgentPerformance): FocusArea[] {
  return FOCUS_AREAS.filter((area) => metricFor[area](p) > FOCUS_LIMITS[area]);
}

export function tierAgents(agents: readonly AgentPerformance[]): Tiers {
  const tiers: Tiers = { top: [], developing: [], needsSupport: [] };
  for (const p of agents) {
    const entry = { agentName: p.agentName, avgScore: p.avgScore, exceptionalCount: p.exceptionalCount };
    if (p.avgScore >= TIER_THRESHOLDS.top) tiers.top.push(entry);
    else if (p.avgScore >= TIER_THRESHOLDS.developing) tiers.developing.push(entry);
    else tiers.needsSupport.push({ ...entry, focusAreas: focusAreas(p) });
  }
  return tiers;
}

export function recommend(totalCalls: number, agents: readonly AgentPerformance[], tiers: Tiers): Recommendation[] {
  const actions: Recommendation[] = [];

  for (const issue of FOCUS_AREAS) {
    const occurrences = agents.reduce((sum, p) => sum + metricFor[issue](p), 0);
    const threshold = TEAM_TRAINING_THRESHOLDS[issue];
    if (occurrences > totalCalls * threshold) {
      actions.push({ kind: 'team-training', issue, occurrences, threshold, message: TRAINING_MESSAGES[issue] });
    }
  }

  for (const entry of tiers.needsSupport) {
    actions.push({
      kind: 'one-on-one',
      agentName: entry.agentName,
      avgScore: entry.avgScore,
      message: `${entry.agentName} needs immediate support (score: ${entry.avgScore.toFixed(1)})`,
    });
  }

  return actions;
}

function leaderboard(agents: readonly AgentPerformance[]): LeaderboardRow[] {
  return [...agents]
    .sort((a, b) => b.closeRate - a.closeRate)
    .map((p, i) => ({
      rank: i + 1,
      agentName: p.agentName,
      calls: p.totalCalls,
      closeRate: p.closeRate,
      avgScore: p.avgScore,
      closed: p.closed,
      lost: p.lost,
    }));
}

/**
 * Team-wide reduction over every record in the set. Per-agent rows come from
 * `aggregateForAgent`; call totals include records without an agent name.
 */
export function aggregateForTeam(records: readonly CallRecord[]): TeamAggregate {
  const outcomes = emptyOutcomes();
  const overall: number[] = [];
  for (const record of records) {
    if (isEmptyFeedback(record.feedback)) continue;
    tallyOutcome(outcomes, record.feedback.call_outcome);
    const score = readScore(record.feedback.call_score, 'overall');
    if (isRated(score)) overall.push(score);
  }

  const agents = listAgents(records).map((name) => performanceFor(records, name));
  const tiers = tierAgents(agents);

  const spotlight: Record<SpotlightCategory, AgentCount[]> = {
    objection_handling: rankAgentsByCategory(records, 'objection_handling', TRIAGE_SIZE),
    empathy: rankAgentsByCategory(records, 'empathy', TRIAGE_SIZE),
    active_listening: rankAgentsByCategory(records, 'active_listening', TRIAGE_SIZE),
    probing: rankAgentsByCategory(records, 'probing', TRIAGE_SIZE),
  };

  return {
    totalCalls: records.length,
    outcomes,
    closeRate: closeRate(outcomes),
    avgScore: average(overall),
    agents,
    leaderboard: leaderboard(agents),
    priorities: {
      active_listening: triage(agents, 'active_listening'),
      probing: triage(agents, 'probing'),
      discounting: triage(agents, 'discounting'),
    },
    tiers,
    recommendations: recommend(records.length, agents, tiers),
    spotlight,
  };
}
