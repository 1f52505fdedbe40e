import { describe, expect, it } from 'vitest';

import { aggregateForAgent, closeRate } from './aggregate.js';
import { parseFeedback } from './feedback.js';
import type { FeedbackPayload } from './schemas/feedback.js';
import type { CallRecord } from './types.js';

const call = (agentName: string, feedback: FeedbackPayload, filename = 'call.wav'): CallRecord => ({
  agentName,
  date: '2026-10-12 10:00',
  filename,
  transcript: '',
  feedback,
});

describe('aggregateForAgent', () => {
  it('computes close rate, average and outcomes for a simple agent', () => {
    const records = [
      call('Alex', { call_outcome: 'closed', call_score: { overall_score: 8 } }),
      call('Alex', { call_outcome: 'lost', call_score: { overall_score: 4 } }),
      call('Sam', { call_outcome: 'closed', call_score: { overall_score: 10 } }),
    ];

    const agg = aggregateForAgent(records, 'Alex');

    expect(agg.totalCalls).toBe(2);
    expect(agg.closeRate).toBe(50);
    expect(agg.averages.overall).toBe(6);
    expect(agg.outcomes).toEqual({ closed: 1, lost: 1, followUp: 0 });
  });

  it('leaves zero scores out of the average', () => {
    const records = [0, 0, 8].map((overall_score) => call('Alex', { call_score: { overall_score } }));
    const agg = aggregateForAgent(records, 'Alex');
    expect(agg.averages.overall).toBe(8);
    expect(agg.scores.overall).toEqual([8]);
  });

  it('falls back to call_score.overall', () => {
    const agg = aggregateForAgent([call('Alex', { call_score: { overall: 7 } })], 'Alex');
    expect(agg.averages.overall).toBe(7);
  });

  it('does not move the close rate when follow-ups are added', () => {
    const base = [call('Alex', { call_outcome: 'closed' }), call('Alex', { call_outcome: 'lost' })];
    const withFollowUps = [
      ...base,
      call('Alex', { call_outcome: 'follow-up-scheduled' }),
      call('Alex', { call_outcome: 'needs-callback' }),
    ];

    expect(aggregateForAgent(withFollowUps, 'Alex').closeRate).toBe(aggregateForAgent(base, 'Alex').closeRate);
    expect(aggregateForAgent(withFollowUps, 'Alex').outcomes.followUp).toBe(2);
  });

  it('counts a SPIN gap for each call missing the flag', () => {
    const records = [
      call('Alex', { spin_analysis: { implication_questions_used: true } }),
      call('Alex', { spin_analysis: { implication_questions_used: false } }),
      call('Alex', { spin_analysis: {} }),
      call('Alex', { summary: 'no spin block' }),
      call('Alex', { spin_analysis: { implication_questions_used: true } }),
    ];

    const agg = aggregateForAgent(records, 'Alex');

    expect(agg.spinGaps.implication).toBe(3);
    expect(agg.spinGaps.situation).toBe(5);
    expect(agg.implicationCritical).toBe(true);
  });

  it('counts Sandler gaps', () => {
    const agg = aggregateForAgent(
      [
        call('Alex', {
          sandler_analysis: { upfront_contract_established: true, pain_depth: 'surface', budget_qualified: true },
        }),
        call('Alex', { sandler_analysis: { pain_depth: 'deep', decision_process_identified: true } }),
      ],
      'Alex',
    );
    expect(agg.sandlerGaps).toEqual({ upfrontContract: 1, painDepthSurface: 1, budgetQualified: 1, decisionProcess: 1 });
  });

  it('captures patterns with their source', () => {
    const agg = aggregateForAgent(
      [
        call(
          'Alex',
          {
            active_listening_failures: [{ timestamp: '01:05', what_was_missed: 'cut off customer' }],
            missed_probing_opportunities: [{ surface_answer: 'It is fine', should_have_asked: 'What does fine cost you?' }],
            emotional_cues_missed: [{ timestamp: '03:00', customer_emotion: 'frustrated' }],
            objection_handling_analysis: [
              { objection: 'too expensive', effectiveness_rating: 4, went_straight_to_discount: true },
              { objection: 'need to think', effectiveness_rating: 8, value_established: true },
            ],
          },
          'a.wav',
        ),
      ],
      'Alex',
    );

    expect(agg.listeningPatterns).toEqual([
      { date: '2026-10-12 10:00', filename: 'a.wav', timestamp: '01:05', offsetSeconds: 65, whatWasMissed: 'cut off customer' },
    ]);
    expect(agg.probingPatterns[0]).toMatchObject({
      pattern: 'Stopped at surface level',
      timestamp: '',
      offsetSeconds: 0,
      surfaceAnswer: 'It is fine',
    });
    expect(agg.emotionalCuePatterns[0]).toMatchObject({ emotion: 'frustrated', acknowledgment: 'none', offsetSeconds: 180 });
    expect(agg.objectionSummary).toEqual({ count: 2, discountJumps: 1, avgEffectiveness: 6 });
  });

  it('counts empty feedback towards total calls only', () => {
    const agg = aggregateForAgent([call('Alex', {}), call('Alex', { call_outcome: 'closed' })], 'Alex');
    expect(agg.totalCalls).toBe(2);
    expect(agg.outcomes).toEqual({ closed: 1, lost: 0, followUp: 0 });
    expect(agg.spinGaps.situation).toBe(1);
  });

  it('returns a zero aggregate for an unknown agent', () => {
    const agg = aggregateForAgent([call('Sam', { call_outcome: 'closed' })], 'Alex');
    expect(agg.totalCalls).toBe(0);
    expect(agg.closeRate).toBe(0);
    expect(agg.averages.overall).toBe(0);
    expect(agg.implicationCritical).toBe(false);
    expect(agg.listeningPatterns).toEqual([]);
  });

  it('collects strengths and weaknesses as text', () => {
    const agg = aggregateForAgent(
      [call('Alex', { what_went_well: ['Warm opener', { text: 'Clear recap' }], opportunities_to_improve: ['Ask more'] })],
      'Alex',
    );
    expect(agg.commonStrengths).toEqual(['Warm opener', 'Clear recap']);
    expect(agg.commonWeaknesses).toEqual(['Ask more']);
  });

  it('treats truthy non-boolean flags as present', () => {
    const feedback = parseFeedback(
      '{"spin_analysis":{"situation_questions_used":"yes","problem_questions_used":1},' +
        '"sandler_analysis":{"budget_qualified":"true","upfront_contract_established":0},' +
        '"objection_handling_analysis":[{"objection":"price","went_straight_to_discount":"yes"}]}',
    );
    const agg = aggregateForAgent([call('Alex', feedback)], 'Alex');

    expect(agg.spinGaps).toEqual({ situation: 0, problem: 0, implication: 1, needPayoff: 1 });
    expect(agg.sandlerGaps).toEqual({ upfrontContract: 1, painDepthSurface: 0, budgetQualified: 0, decisionProcess: 1 });
    expect(agg.objectionSummary.discountJumps).toBe(1);
  });

  it('counts only shareworthy exceptional moments', () => {
    const agg = aggregateForAgent(
      [call('Alex', { exceptional_moments: [{ shareworthy: true }, { shareworthy: 'true' }, { shareworthy: false }, { shareworthy: '' }, {}] })],
      'Alex',
    );
    expect(agg.exceptionalCount).toBe(2);
  });
});

describe('closeRate', () => {
  it('is zero with no decided calls', () => {
    expect(closeRate({ closed: 0, lost: 0, followUp: 3 })).toBe(0);
    expect(closeRate({ closed: 3, lost: 1, followUp: 0 })).toBe(75);
  });
});
