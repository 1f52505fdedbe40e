import {
  aggregateForTeam,
  type AgentCount,
  type SupportEntry,
  type TeamAggregate,
  type TierEntry,
  type TimeWindow,
} from '@callcoach/analytics';
import type { Command } from 'commander';

import { fail, formatPercent, formatScore, humanize } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading, muted, printBanner, printEnd, tierColor } from '../utils/ui.js';
import { WINDOW_HELP, loadWindow, type WindowOptions } from './shared.js';

const NONE = () => `  ${muted('none')}`;

const counts = (rows: readonly AgentCount[]): string =>
  rows.length ? rows.map((r) => `${r.agentName} (${r.count})`).join(', ') : muted('none');

export function tierLines(entries: readonly (TierEntry | SupportEntry)[]): string[] {
  if (!entries.length) return [NONE()];
  const width = Math.max(...entries.map((e) => e.agentName.length));
  return entries.map((e) => {
    const extras: string[] = [];
    if (e.exceptionalCount > 0) extras.push(`★ ${e.exceptionalCount} shareworthy`);
    if ('focusAreas' in e && e.focusAreas.length) extras.push(`focus: ${e.focusAreas.map(humanize).join(', ')}`);
    const score = tierColor(e.avgScore, formatScore(e.avgScore));
    return `  ${e.agentName.padEnd(width)}  ${score}${extras.length ? `  ${extras.join('  ')}` : ''}`;
  });
}

/** Executive summary: totals, tiers, priorities, actions and spotlight */
export function renderSummary(team: TeamAggregate, window: TimeWindow): string[] {
  const out = [
    heading(`Team summary · ${window}`),
    `  calls ${team.totalCalls}  close rate ${formatPercent(team.closeRate)}  avg score ${formatScore(team.avgScore)}`,
    `  ${team.outcomes.closed} closed, ${team.outcomes.lost} lost, ${team.outcomes.followUp} follow-up`,
  ];
  if (team.totalCalls === 0) return [...out, '', 'no calls in this window'];

  out.push('', heading('Top performers'), ...tierLines(team.tiers.top));
  out.push('', heading('Developing'), ...tierLines(team.tiers.developing));
  out.push('', heading('Needs support'), ...tierLines(team.tiers.needsSupport));

  out.push('', heading('Priorities'));
  for (const [area, rows] of Object.entries(team.priorities)) {
    out.push(`  ${humanize(area)}: ${counts(rows)}`);
  }

  out.push('', heading('Actions'));
  if (!team.recommendations.length) out.push(NONE());
  for (const rec of team.recommendations) out.push(`  • ${rec.message}`);

  const spotlight = Object.entries(team.spotlight).filter(([, rows]) => rows.length > 0);
  if (spotlight.length) {
    out.push('', heading('Spotlight'));
    for (const [category, rows] of spotlight) out.push(`  ${humanize(category)}: ${counts(rows)}`);
  }
  return out;
}

export const registerSummary = (program: Command): void => {
  program
    .command('summary')
    .description('team executive summary')
    .option('--window <window>', WINDOW_HELP, 'all-time')
    .action(async (opts: WindowOptions) => {
      try {
        const { window, records } = await loadWindow(opts);
        const team = aggregateForTeam(records);
        if (isJson()) {
          json({ window, ...team });
          return;
        }
        printBanner('callcoach');
        lines(renderSummary(team, window));
        printEnd();
      } catch (err: unknown) {
        fail(err, 'summary');
      }
    });
};
