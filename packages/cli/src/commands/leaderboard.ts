import { aggregateForTeam, type LeaderboardRow, type TimeWindow } from '@callcoach/analytics';
import type { Command } from 'commander';

import { fail, formatPercent, formatScore, table } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading } from '../utils/ui.js';
import { WINDOW_HELP, loadWindow, type WindowOptions } from './shared.js';

export function renderLeaderboard(rows: readonly LeaderboardRow[], window: TimeWindow): string[] {
  if (!rows.length) return [heading(`Leaderboard · ${window}`), 'no calls in this window'];
  return [
    heading(`Leaderboard · ${window}`),
    ...table([
      ['#', 'agent', 'calls', 'close rate', 'avg score', 'won-lost'],
      ...rows.map((r) => [
        String(r.rank),
        r.agentName,
        String(r.calls),
        formatPercent(r.closeRate),
        formatScore(r.avgScore),
        `${r.closed}-${r.lost}`,
      ]),
    ]),
  ];
}

export const registerLeaderboard = (program: Command): void => {
  program
    .command('leaderboard')
    .description('reps ranked by close rate')
    .option('--window <window>', WINDOW_HELP, 'all-time')
    .action(async (opts: WindowOptions) => {
      try {
        const { window, records } = await loadWindow(opts);
        const { leaderboard } = aggregateForTeam(records);
        if (isJson()) {
          json({ window, leaderboard });
          return;
        }
        lines(renderLeaderboard(leaderboard, window));
      } catch (err: unknown) {
        fail(err, 'leaderboard');
      }
    });
};
