import { searchTranscripts, type SearchHit } from '@callcoach/analytics';
import type { Command } from 'commander';

import { CliError } from '../errors.js';
import { fail } from '../cli-utils.js';
import { isJson, json, lines } from '../output.js';
import { heading, muted } from '../utils/ui.js';
import { WINDOW_HELP, loadWindow, type WindowOptions } from './shared.js';

export function renderSearch(hits: readonly SearchHit[], keyword: string): string[] {
  const out = [heading(`${hits.length} ${hits.length === 1 ? 'call mentions' : 'calls mention'} "${keyword}"`)];
  for (const hit of hits) {
    out.push('', `  ${hit.agentName} · ${hit.filename} · ${hit.date}`);
    if (hit.summary) out.push(`    ${hit.summary}`);
    out.push(`    ${muted(`${hit.excerpt}${hit.truncated ? '…' : ''}`)}`);
  }
  return out;
}

export const registerSearch = (program: Command): void => {
  program
    .command('search')
    .description('search call transcripts')
    .argument('<keyword>', 'text to look for (case-insensitive)')
    .option('--window <window>', WINDOW_HELP, 'all-time')
    .option('--excerpt <chars>', 'excerpt length', '300')
    .action(async (keyword: string, opts: WindowOptions & { excerpt: string }) => {
      try {
        if (!keyword.trim()) throw new CliError('INVALID_ARGUMENT', 'keyword must not be blank');
        const excerptLength = Number.parseInt(opts.excerpt, 10);
        const { window, records } = await loadWindow(opts);
        const hits = searchTranscripts(records, keyword, {
          excerptLength: Number.isFinite(excerptLength) ? excerptLength : undefined,
        });
        if (isJson()) {
          json({ window, query: keyword, count: hits.length, results: hits });
          return;
        }
        lines(renderSearch(hits, keyword));
      } catch (err: unknown) {
        fail(err, 'search');
      }
    });
};
