// Feedback
export { parseFeedback, stripCodeFence, isEmptyFeedback, isRecord, isTruthy, toText } from './feedback.js';
export {
  FeedbackSchema,
  CALL_OUTCOMES,
  type CallOutcome,
  type CallScore,
  type ListeningFailure,
  type ProbingMiss,
  type EmotionalCue,
  type ApproachStep,
  type ObjectionAnalysis,
  type ExceptionalMoment,
  type SpinAnalysis,
  type SandlerAnalysis,
  type FeedbackPayload,
} from './schemas/feedback.js';

// Time windows
export { TIME_WINDOWS, resolveWindow, windowStart, parseCallDate, filterByWindow, type TimeWindow } from './window.js';
export { parseTimestamp, formatOffset } from './timestamps.js';

// Aggregation
export { aggregateForAgent, closeRate, average, isRated, readScore } from './aggregate.js';
export { buildAgentReport, type AgentReport } from './report.js';
export { aggregateForTeam, listAgents, tierAgents, recommend, TIER_THRESHOLDS, TEAM_TRAINING_THRESHOLDS } from './team.js';

// Patterns
export {
  rankPatterns,
  collectShareworthyMoments,
  rankAgentsByCategory,
  type PatternCount,
  type PatternKey,
  type MomentView,
  type ShareworthyCall,
} from './patterns.js';

// Review & search
export { buildCallReview, findCall, type CallReview, type CoachingMoment, type MomentKind } from './review.js';
export { searchTranscripts, type SearchHit, type SearchOptions } from './search.js';

// Types
export { SKILL_KEYS, SPOTLIGHT_CATEGORIES } from './types.js';
export type {
  CallRecord,
  SkillKey,
  SkillScores,
  SkillAverages,
  OutcomeCounts,
  PatternSource,
  ListeningPattern,
  ProbingPattern,
  EmotionalCuePattern,
  ObjectionPattern,
  SpinGaps,
  SandlerGaps,
  ObjectionSummary,
  AgentAggregate,
  AgentPerformance,
  AgentCount,
  LeaderboardRow,
  FocusArea,
  TierEntry,
  SupportEntry,
  Tiers,
  Recommendation,
  SpotlightCategory,
  TeamAggregate,
} from './types.js';
