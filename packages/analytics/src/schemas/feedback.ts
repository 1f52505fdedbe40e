/**
 * Structured feedback produced for each analysed call.
 *
 * The upstream generator is best-effort, so every recognised field is optional
 * and a field holding the wrong type is dropped rather than failing the whole
 * payload. Behaviour flags keep whatever value the generator wrote and are
 * read by truthiness. Unrecognised fields pass through untouched.
 */
import { z } from 'zod';

const text = z.string().optional().catch(undefined);
const flag = z.unknown().optional();
// "MM:SS" strings, or a bare number of seconds carried forward as text
const stamp = z.union([z.string(), z.number().transform(String)]).optional().catch(undefined);
const num = z.number().optional().catch(undefined);

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Array of event objects; entries that are not objects are discarded */
const events = <T extends z.ZodTypeAny>(item: T) =>
  z
    .preprocess((value) => (Array.isArray(value) ? value.filter(isObject) : value), z.array(item))
    .optional()
    .catch(undefined);

export const CALL_OUTCOMES = ['closed', 'lost', 'follow-up-scheduled', 'needs-callback'] as const;
export type CallOutcome = (typeof CALL_OUTCOMES)[number];

export const CallScoreSchema = z
  .object({
    overall_score: num,
    overall: num,
    active_listening: num,
    probing_depth: num,
    emotional_intelligence: num,
    value_based_selling: num,
    spin_effectiveness: num,
    sandler_effectiveness: num,
    objection_handling: num,
  })
  .passthrough();

export const ListeningFailureSchema = z
  .object({
    timestamp: stamp,
    customer_said: text,
    rep_response: text,
    what_rep_attempted: text,
    what_worked: text,
    what_was_missed: text,
    why_it_matters: text,
    better_response: text,
    framework_connection: text,
  })
  .passthrough();

export const ProbingMissSchema = z
  .object({
    timestamp: stamp,
    surface_answer: text,
    what_rep_did_instead: text,
    why_stopping_hurts: text,
    should_have_asked: text,
    why_this_question_works: text,
    framework_connection: text,
  })
  .passthrough();

export const EmotionalCueSchema = z
  .object({
    timestamp: stamp,
    customer_emotion: text,
    signal: text,
    rep_acknowledgment_level: text,
    rep_attempted: text,
    what_worked: text,
    rep_missed_it: text,
    why_it_matters: text,
    empathy_response: text,
    framework_connection: text,
  })
  .passthrough();

export const ApproachStepSchema = z
  .object({
    step: z.union([z.number(), z.string()]).optional().catch(undefined),
    action: text,
    example: text,
    why: text,
  })
  .passthrough();

export const ObjectionAnalysisSchema = z
  .object({
    timestamp: stamp,
    objection: text,
    real_objection: text,
    effectiveness_rating: num,
    rep_response: text,
    rep_attempted: text,
    what_worked: text,
    went_straight_to_discount: flag,
    value_established: flag,
    critical_failures: z.array(z.unknown()).optional().catch(undefined),
    step_by_step_better_approach: events(ApproachStepSchema),
    sandler_technique_recommended: text,
    why_this_technique: text,
    framework_connections: text,
  })
  .passthrough();

export const ExceptionalMomentSchema = z
  .object({
    timestamp: stamp,
    category: text,
    shareworthy: flag,
    customer_quote: text,
    rep_quote: text,
    what_happened: text,
    why_exceptional: text,
    coaching_insight: text,
  })
  .passthrough();

export const SpinAnalysisSchema = z
  .object({
    situation_questions_used: flag,
    problem_questions_used: flag,
    implication_questions_used: flag,
    need_payoff_questions_used: flag,
  })
  .passthrough();

export const SandlerAnalysisSchema = z
  .object({
    upfront_contract_established: flag,
    pain_depth: text,
    budget_qualified: flag,
    decision_process_identified: flag,
  })
  .passthrough();

export const FeedbackSchema = z
  .object({
    call_outcome: text,
    summary: text,
    customer_intent: text,
    close_reason: text,
    call_score: CallScoreSchema.optional().catch(undefined),
    what_went_well: z.array(z.unknown()).optional().catch(undefined),
    opportunities_to_improve: z.array(z.unknown()).optional().catch(undefined),
    active_listening_failures: events(ListeningFailureSchema),
    missed_probing_opportunities: events(ProbingMissSchema),
    emotional_cues_missed: events(EmotionalCueSchema),
    objection_handling_analysis: events(ObjectionAnalysisSchema),
    exceptional_moments: events(ExceptionalMomentSchema),
    spin_analysis: SpinAnalysisSchema.optional().catch(undefined),
    sandler_analysis: SandlerAnalysisSchema.optional().catch(undefined),
    sample_phrases: z.record(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type CallScore = z.infer<typeof CallScoreSchema>;
export type ListeningFailure = z.infer<typeof ListeningFailureSchema>;
export type ProbingMiss = z.infer<typeof ProbingMissSchema>;
export type EmotionalCue = z.infer<typeof EmotionalCueSchema>;
export type ApproachStep = z.infer<typeof ApproachStepSchema>;
export type ObjectionAnalysis = z.infer<typeof ObjectionAnalysisSchema>;
export type ExceptionalMoment = z.infer<typeof ExceptionalMomentSchema>;
export type SpinAnalysis = z.infer<typeof SpinAnalysisSchema>;
export type SandlerAnalysis = z.infer<typeof SandlerAnalysisSchema>;
export type FeedbackPayload = z.infer<typeof FeedbackSchema>;
