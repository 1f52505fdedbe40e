import chalk from 'chalk';
import { describe, expect, it } from 'vitest';

import { renderLeaderboard } from './leaderboard.js';

chalk.level = 0;

describe('renderLeaderboard', () => {
  it('aligns the ranking into columns', () => {
    const rows = [
      { rank: 1, agentName: 'Alex', calls: 2, closeRate: 100, avgScore: 8.5, closed: 2, lost: 0 },
      { rank: 2, agentName: 'Casey', calls: 1, closeRate: 0, avgScore: 3, closed: 0, lost: 1 },
    ];
    expect(renderLeaderboard(rows, 'this-month')).toEqual([
      'Leaderboard · this-month',
      '#  agent  calls  close rate  avg score  won-lost',
      '1  Alex   2      100.0%      8.5/10     2-0',
      '2  Casey  1      0.0%        3.0/10     0-1',
    ]);
  });

  it('says so when there are no calls', () => {
    expect(renderLeaderboard([], 'all-time')).toEqual(['Leaderboard · all-time', 'no calls in this window']);
  });
});
