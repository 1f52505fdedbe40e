import type { FeedbackPayload } from './schemas/feedback.js';

/** One analysed call, as supplied by a record source */
export interface CallRecord {
  agentName: string;
  /** Raw date string from the source; parsed on demand by the time filter */
  date: string;
  filename: string;
  transcript: string;
  disposition?: string;
  /** Seconds */
  callDuration?: number;
  audioUrl?: string;
  /** `{}` when the source had no usable feedback */
  feedback: FeedbackPayload;
}

export const SKILL_KEYS = [
  'overall',
  'active_listening',
  'probing_depth',
  'emotional_intelligence',
  'value_based_selling',
  'spin_effectiveness',
  'sandler_effectiveness',
  'objection_handling',
] as const;
export type SkillKey = (typeof SKILL_KEYS)[number];

export type SkillScores = Record<SkillKey, number[]>;
export type SkillAverages = Record<SkillKey, number>;

export interface OutcomeCounts {
  closed: number;
  lost: number;
  /** follow-up-scheduled and needs-callback */
  followUp: number;
}

/** Where a captured pattern came from */
export interface PatternSource {
  date: string;
  filename: string;
  timestamp: string;
  offsetSeconds: number;
}

export interface ListeningPattern extends PatternSource {
  whatWasMissed: string;
}

export interface ProbingPattern extends PatternSource {
  pattern: string;
  surfaceAnswer: string;
  shouldHaveAsked: string;
}

export interface EmotionalCuePattern extends PatternSource {
  emotion: string;
  acknowledgment: string;
}

export interface ObjectionPattern extends PatternSource {
  objection: string;
  effectiveness: number;
  wentToDiscount: boolean;
  valueEstablished: boolean;
}

export interface SpinGaps {
  situation: number;
  problem: number;
  implication: number;
  needPayoff: number;
}

export interface SandlerGaps {
  upfrontContract: number;
  painDepthSurface: number;
  budgetQualified: number;
  decisionProcess: number;
}

export interface ObjectionSummary {
  count: number;
  discountJumps: number;
  avgEffectiveness: number;
}

export interface AgentAggregate {
  agentName: string;
  totalCalls: number;
  outcomes: OutcomeCounts;
  /** Percentage of decided (closed + lost) calls that closed */
  closeRate: number;
  scores: SkillScores;
  averages: SkillAverages;
  commonStrengths: string[];
  commonWeaknesses: string[];
  listeningPatterns: ListeningPattern[];
  probingPatterns: ProbingPattern[];
  emotionalCuePatterns: EmotionalCuePattern[];
  objectionPatterns: ObjectionPattern[];
  spinGaps: SpinGaps;
  sandlerGaps: SandlerGaps;
  objectionSummary: ObjectionSummary;
  /** Implication questions missing in more than half of the calls */
  implicationCritical: boolean;
  /** Shareworthy exceptional moments */
  exceptionalCount: number;
}

export interface AgentPerformance {
  agentName: string;
  totalCalls: number;
  closed: number;
  lost: number;
  followUp: number;
  closeRate: number;
  avgScore: number;
  scoredCalls: number;
  listeningFails: number;
  probingFails: number;
  emotionalFails: number;
  objectionCount: number;
  discountCount: number;
  exceptionalCount: number;
}

export interface AgentCount {
  agentName: string;
  count: number;
}

export interface LeaderboardRow {
  rank: number;
  agentName: string;
  calls: number;
  closeRate: number;
  avgScore: number;
  closed: number;
  lost: number;
}

export type FocusArea = 'active_listening' | 'probing' | 'discounting';

export interface TierEntry {
  agentName: string;
  avgScore: number;
  exceptionalCount: number;
}

export interface SupportEntry extends TierEntry {
  focusAreas: FocusArea[];
}

export interface Tiers {
  /** avg ≥ 7 */
  top: TierEntry[];
  /** 5 ≤ avg < 7 */
  developing: TierEntry[];
  /** avg < 5 */
  needsSupport: SupportEntry[];
}

export type Recommendation =
  | { kind: 'team-training'; issue: FocusArea; occurrences: number; threshold: number; message: string }
  | { kind: 'one-on-one'; agentName: string; avgScore: number; message: string };

export const SPOTLIGHT_CATEGORIES = ['objection_handling', 'empathy', 'active_listening', 'probing'] as const;
export type SpotlightCategory = (typeof SPOTLIGHT_CATEGORIES)[number];

export interface TeamAggregate {
  totalCalls: number;
  outcomes: OutcomeCounts;
  closeRate: number;
  avgScore: number;
  agents: AgentPerformance[];
  leaderboard: LeaderboardRow[];
  priorities: Record<FocusArea, AgentCount[]>;
  tiers: Tiers;
  recommendations: Recommendation[];
  spotlight: Record<SpotlightCategory, AgentCount[]>;
}
