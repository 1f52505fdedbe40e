import { collectShareworthyMoments, type ShareworthyCall, type TimeWindow } from '@callcoach/analytics';
import type { Command } from 'commander';

import { fail, humanize } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading, muted, outcomeIcon } from '../utils/ui.js';
import { WINDOW_HELP, loadWindow, type WindowOptions } from './shared.js';

/** Shareworthy moments feed, one block per call */
export function renderMoments(feed: readonly ShareworthyCall[], window: TimeWindow): string[] {
  const out = [heading(`Shareworthy moments · ${window}`)];
  if (!feed.length) return [...out, 'no shareworthy moments yet'];

  for (const call of feed) {
    out.push('', `${outcomeIcon(call.outcome)} ${call.agentName} · ${call.filename} · ${call.outcome}`);
    for (const m of call.moments) {
      out.push(`  [${m.timestamp || '--:--'}] ${humanize(m.category)}`);
      if (m.customerQuote) out.push(`    customer: "${m.customerQuote}"`);
      if (m.repQuote) out.push(`    rep: "${m.repQuote}"`);
      if (m.whyExceptional) out.push(`    why: ${m.whyExceptional}`);
      if (m.coachingInsight) out.push(`    ${muted(`insight: ${m.coachingInsight}`)}`);
    }
  }
  return out;
}

export const registerMoments = (program: Command): void => {
  program
    .command('moments')
    .description('exceptional moments worth sharing with the team')
    .option('--window <window>', WINDOW_HELP, 'all-time')
    .action(async (opts: WindowOptions) => {
      try {
        const { window, records } = await loadWindow(opts);
        const moments = collectShareworthyMoments(records);
        if (isJson()) {
          json({ window, moments });
          return;
        }
        lines(renderMoments(moments, window));
      } catch (err: unknown) {
        fail(err, 'moments');
      }
    });
};
