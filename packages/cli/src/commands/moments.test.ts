import chalk from 'chalk';
import { describe, expect, it } from 'vitest';

import { renderMoments } from './moments.js';

chalk.level = 0;

describe('renderMoments', () => {
  it('renders one block per call', () => {
    const feed = [
      {
        agentName: 'Alex',
        filename: 'a.wav',
        date: '2026-10-12',
        outcome: 'closed',
        moments: [
          {
            category: 'objection_handling',
            timestamp: '03:15',
            offsetSeconds: 195,
            customerQuote: 'Too pricey',
            repQuote: 'What would it cost to do nothing?',
            whatHappened: '',
            whyExceptional: 'Reframed on value',
            coachingInsight: 'Use with price objections',
          },
          { category: 'empathy', timestamp: '', offsetSeconds: 0, customerQuote: '', repQuote: '', whatHappened: '', whyExceptional: '' },
        ],
      },
    ];
    expect(renderMoments(feed, 'all-time')).toEqual([
      'Shareworthy moments · all-time',
      '',
      '● Alex · a.wav · closed',
      '  [03:15] objection handling',
      '    customer: "Too pricey"',
      '    rep: "What would it cost to do nothing?"',
      '    why: Reframed on value',
      '    insight: Use with price objections',
      '  [--:--] empathy',
    ]);
  });

  it('says so when nothing is shareworthy', () => {
    expect(renderMoments([], 'today')).toEqual(['Shareworthy moments · today', 'no shareworthy moments yet']);
  });
});
