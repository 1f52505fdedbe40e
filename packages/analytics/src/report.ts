import { aggregateForAgent } from './aggregate.js';
import { rankPatterns, type PatternCount } from './patterns.js';
import type { AgentAggregate, CallRecord } from './types.js';

export interface AgentReport extends AgentAggregate {
  topListeningMisses: PatternCount[];
  emotionsMissed: PatternCount[];
  topStrengths: PatternCount[];
  topWeaknesses: PatternCount[];
}

const same = (s: string) => s;

/** Agent aggregate plus the ranked patterns a deep dive shows */
export function buildAgentReport(records: readonly CallRecord[], agentName: string, topN = 5): AgentReport {
  const agg = aggregateForAgent(records, agentName);
  return {
    ...agg,
    topListeningMisses: rankPatterns(agg.listeningPatterns, 'whatWasMissed', topN),
    emotionsMissed: rankPatterns(agg.emotionalCuePatterns, 'emotion'),
    topStrengths: rankPatterns(agg.commonStrengths, same, topN),
    topWeaknesses: rankPatterns(agg.commonWeaknesses, same, topN),
  };
}
