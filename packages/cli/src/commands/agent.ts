import {
  SKILL_KEYS,
  buildAgentReport,
  type AgentReport,
  type PatternCount,
  type TimeWindow,
} from '@callcoach/analytics';
import type { Command } from 'commander';

import { CliError } from '../errors.js';
import { fail, formatPercent, formatScore, humanize } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading, muted, tierColor } from '../utils/ui.js';
import { WINDOW_HELP, loadWindow, type WindowOptions } from './shared.js';

const ranked = (title: string, rows: readonly PatternCount[]): string[] => [
  '',
  heading(title),
  ...(rows.length ? rows.map((r) => `  ${r.key} (${r.count})`) : [`  ${muted('none')}`]),
];

/** Rep deep dive */
export function renderAgent(report: AgentReport, window: TimeWindow): string[] {
  const { outcomes, spinGaps, sandlerGaps, objectionSummary } = report;
  const out = [
    heading(`${report.agentName} · ${window}`),
    `  calls ${report.totalCalls}  close rate ${formatPercent(report.closeRate)}  avg score ${formatScore(report.averages.overall)}`,
    `  ${outcomes.closed} closed, ${outcomes.lost} lost, ${outcomes.followUp} follow-up`,
  ];
  if (report.totalCalls === 0) return [...out, '', 'no calls in this window'];

  const skills = SKILL_KEYS.filter((k) => k !== 'overall' && report.averages[k] > 0);
  if (skills.length) {
    const width = Math.max(...skills.map((k) => humanize(k).length));
    out.push('', heading('Skills'));
    for (const k of skills) {
      const score = report.averages[k];
      out.push(`  ${humanize(k).padEnd(width)}  ${tierColor(score, formatScore(score))}`);
    }
  }

  out.push(
    '',
    heading('SPIN gaps'),
    `  situation ${spinGaps.situation}  problem ${spinGaps.problem}  implication ${spinGaps.implication}  need-payoff ${spinGaps.needPayoff}`,
  );
  if (report.implicationCritical) out.push('  ⚠ implication questions missing in over half of calls');

  out.push(
    '',
    heading('Sandler gaps'),
    `  upfront contract ${sandlerGaps.upfrontContract}  surface pain ${sandlerGaps.painDepthSurface}  budget ${sandlerGaps.budgetQualified}  decision process ${sandlerGaps.decisionProcess}`,
  );

  if (objectionSummary.count > 0) {
    out.push(
      '',
      heading('Objections'),
      `  ${objectionSummary.count} handled, ${objectionSummary.discountJumps} straight to discount, avg effectiveness ${formatScore(objectionSummary.avgEffectiveness)}`,
    );
  }

  out.push(...ranked('Listening misses', report.topListeningMisses));
  out.push(...ranked('Emotions missed', report.emotionsMissed));
  out.push(...ranked('Strengths', report.topStrengths));
  out.push(...ranked('To improve', report.topWeaknesses));
  return out;
}

export const registerAgent = (program: Command): void => {
  program
    .command('agent')
    .description('deep dive on one rep')
    .argument('<name>', 'agent name as it appears in the records')
    .option('--window <window>', WINDOW_HELP, 'all-time')
    .action(async (name: string, opts: WindowOptions) => {
      try {
        const { window, all, records } = await loadWindow(opts);
        if (!all.some((r) => r.agentName === name)) {
          throw new CliError('NOT_FOUND', `no calls found for agent "${name}"`);
        }
        const report = buildAgentReport(records, name);
        if (isJson()) {
          json({ window, ...report });
          return;
        }
        lines(renderAgent(report, window));
      } catch (err: unknown) {
        fail(err, 'agent');
      }
    });
};
