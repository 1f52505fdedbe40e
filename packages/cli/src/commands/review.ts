import { buildCallReview, findCall, formatOffset, type CallReview, type MomentKind } from '@callcoach/analytics';
import type { Command } from 'commander';

import { CliError } from '../errors.js';
import { fail, formatDuration, formatScore, humanize } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading, muted, outcomeIcon } from '../utils/ui.js';
import { loadRecords } from './shared.js';

const KIND_LABELS: Record<MomentKind, string> = {
  listening: 'active listening',
  probing: 'probing',
  emotion: 'emotional cue',
  objection: 'objection',
};

/** Single-call coaching breakdown */
export function renderReview(review: CallReview): string[] {
  const out = [
    heading(`${review.filename} · ${review.agentName} · ${review.date}`),
    `  ${outcomeIcon(review.outcome)} ${review.outcome}  score ${formatScore(review.overallScore ?? 0)}  duration ${formatDuration(review.callDuration ?? undefined)}`,
  ];
  if (review.disposition) {
    out.push(`  disposition: ${review.disposition}${review.reachedCreditCard ? '  💳 reached credit card stage' : ''}`);
  }
  if (review.summary) out.push(`  summary: ${review.summary}`);
  if (review.customerIntent) out.push(`  intent: ${review.customerIntent}`);
  if (review.closeReason) out.push(`  close reason: ${review.closeReason}`);

  if (review.moments.length) {
    out.push('', heading('Coaching moments'));
    for (const m of review.moments) {
      const at = m.timestamp ? formatOffset(m.offsetSeconds) : '--:--';
      out.push(`  [${at}] ${KIND_LABELS[m.kind]}: ${m.observed || muted('(not captured)')}`);
      if (m.better) out.push(`      → ${m.better}`);
    }
  }

  if (review.wentWell.length) out.push('', heading('Went well'), ...review.wentWell.map((w) => `  ✓ ${w}`));
  if (review.toImprove.length) out.push('', heading('To improve'), ...review.toImprove.map((w) => `  ⚠ ${w}`));

  const groups = Object.entries(review.samplePhrases);
  if (groups.length) {
    out.push('', heading('Sample phrases'));
    for (const [group, phrases] of groups) {
      out.push(`  ${humanize(group)}`, ...phrases.map((p) => `    - "${p}"`));
    }
  }
  return out;
}

export const registerReview = (program: Command): void => {
  program
    .command('review')
    .description('coaching breakdown for one call')
    .argument('<filename>', 'recording filename')
    .action(async (filename: string) => {
      try {
        const call = findCall(await loadRecords(), filename);
        if (!call) throw new CliError('NOT_FOUND', `no call named "${filename}"`);
        const review = buildCallReview(call);
        if (isJson()) {
          json(review);
          return;
        }
        lines(renderReview(review));
      } catch (err: unknown) {
        fail(err, 'review');
      }
    });
};
