import { describe, expect, it } from 'vitest';

import type { FeedbackPayload } from './schemas/feedback.js';
import { aggregateForTeam, listAgents } from './team.js';
import type { CallRecord } from './types.js';

const call = (agentName: string, feedback: FeedbackPayload): CallRecord => ({
  agentName,
  date: '2026-10-12 10:00',
  filename: `${agentName}.wav`,
  transcript: '',
  feedback,
});

const scored = (agentName: string, outcome: string, overall_score: number, extra: FeedbackPayload = {}) =>
  call(agentName, { call_outcome: outcome, call_score: { overall_score }, ...extra });

const listeningFails = (n: number) => Array.from({ length: n }, () => ({ what_was_missed: 'cut off customer' }));

describe('aggregateForTeam', () => {
  const records = [
    scored('Alex', 'closed', 8),
    scored('Alex', 'closed', 9),
    scored('Blair', 'closed', 6),
    scored('Blair', 'lost', 5),
    scored('Casey', 'lost', 3, { active_listening_failures: listeningFails(4) }),
    scored('Casey', 'follow-up-scheduled', 2),
  ];
  const team = aggregateForTeam(records);

  it('rolls up team totals', () => {
    expect(team.totalCalls).toBe(6);
    expect(team.outcomes).toEqual({ closed: 3, lost: 2, followUp: 1 });
    expect(team.closeRate).toBe(60);
    expect(team.avgScore).toBeCloseTo(33 / 6);
  });

  it('lists agents in first-seen order', () => {
    expect(team.agents.map((a) => a.agentName)).toEqual(['Alex', 'Blair', 'Casey']);
    expect(team.agents[2]).toMatchObject({ totalCalls: 2, lost: 1, followUp: 1, avgScore: 2.5, listeningFails: 4 });
  });

  it('ranks the leaderboard by close rate', () => {
    expect(team.leaderboard.map((r) => [r.rank, r.agentName, r.closeRate])).toEqual([
      [1, 'Alex', 100],
      [2, 'Blair', 50],
      [3, 'Casey', 0],
    ]);
  });

  it('tiers agents by average score', () => {
    expect(team.tiers.top.map((t) => t.agentName)).toEqual(['Alex']);
    expect(team.tiers.developing.map((t) => t.agentName)).toEqual(['Blair']);
    expect(team.tiers.needsSupport).toEqual([
      { agentName: 'Casey', avgScore: 2.5, exceptionalCount: 0, focusAreas: ['active_listening'] },
    ]);
  });

  it('lists only agents with failures in the priorities', () => {
    expect(team.priorities.active_listening).toEqual([{ agentName: 'Casey', count: 4 }]);
    expect(team.priorities.probing).toEqual([]);
    expect(team.priorities.discounting).toEqual([]);
  });

  it('recommends team training and one-on-ones', () => {
    // 4 listening failures > 30% of 6 calls
    expect(team.recommendations).toEqual([
      {
        kind: 'team-training',
        issue: 'active_listening',
        occurrences: 4,
        threshold: 0.3,
        message: 'Active listening workshop: listening failures in over 30% of calls',
      },
      { kind: 'one-on-one', agentName: 'Casey', avgScore: 2.5, message: 'Casey needs immediate support (score: 2.5)' },
    ]);
  });

  it('spotlights agents with shareworthy moments', () => {
    const spot = aggregateForTeam([
      call('Alex', { exceptional_moments: [{ category: 'empathy', shareworthy: true }] }),
      call('Blair', {
        exceptional_moments: [
          { category: 'empathy', shareworthy: true },
          { category: 'empathy', shareworthy: true },
          { category: 'probing', shareworthy: false },
        ],
      }),
    ]).spotlight;

    expect(spot.empathy).toEqual([
      { agentName: 'Blair', count: 2 },
      { agentName: 'Alex', count: 1 },
    ]);
    expect(spot.probing).toEqual([]);
  });

  it('returns an empty aggregate for no records', () => {
    const empty = aggregateForTeam([]);
    expect(empty.totalCalls).toBe(0);
    expect(empty.closeRate).toBe(0);
    expect(empty.avgScore).toBe(0);
    expect(empty.agents).toEqual([]);
    expect(empty.recommendations).toEqual([]);
  });

  it('puts agents without scored calls in needs-support', () => {
    const team = aggregateForTeam([call('Drew', { call_outcome: 'closed' })]);
    expect(team.tiers.needsSupport.map((t) => t.agentName)).toEqual(['Drew']);
  });
});

describe('listAgents', () => {
  it('skips blank names', () => {
    expect(listAgents([call('', {}), call('Alex', {}), call('Alex', {})])).toEqual(['Alex']);
  });
});
