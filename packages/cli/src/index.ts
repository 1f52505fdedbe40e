#!/usr/bin/env tsx

globalThis.__callcoach_cli_mode = true;

import { Command } from 'commander';
import { PostHogTransport, createLogger, registerTransport } from '@callcoach/logger';

import { registerAgent } from './commands/agent.js';
import { registerConfig } from './commands/config.js';
import { registerLeaderboard } from './commands/leaderboard.js';
import { registerMoments } from './commands/moments.js';
import { registerReview } from './commands/review.js';
import { registerSearch } from './commands/search.js';
import { registerServe } from './commands/serve.js';
import { registerSummary } from './commands/summary.js';
import { currentSettings, setSourceFlag } from './context.js';
import { errorMessage } from './errors.js';
import { captureError, initSentry } from './sentry.js';

const logger = createLogger('CLI');
const program = new Command();

await initSentry();

let telemetry: PostHogTransport | null = null;

program
  .name('callcoach')
  .description('coaching dashboard for recorded sales calls')
  .version('0.1.0')
  .option('--json', 'machine-readable output')
  .option('--quiet', 'suppress output')
  .option('--no-telemetry', 'disable error reporting')
  .option('--source <location>', 'CSV path or URL, or a postgres:// connection string')
  .hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<{ json?: boolean; quiet?: boolean; telemetry?: boolean; source?: string }>();
    if (opts.json) globalThis.__callcoach_json = true;
    if (opts.quiet) globalThis.__callcoach_quiet = true;
    setSourceFlag(opts.source);

    const { posthogKey } = currentSettings();
    if (opts.telemetry !== false && posthogKey) {
      telemetry = new PostHogTransport({ apiKey: posthogKey });
      registerTransport(telemetry);
    }
  })
  .hook('postAction', async (_thisCommand, actionCommand) => {
    // serve keeps running; its client flushes on an interval until exit
    if (telemetry && actionCommand.name() !== 'serve') await telemetry.shutdown();
  });

registerSummary(program);
registerAgent(program);
registerLeaderboard(program);
registerMoments(program);
registerSearch(program);
registerReview(program);
registerConfig(program);
registerServe(program);

program.parseAsync().catch((err: unknown) => {
  captureError(err, { command: 'unknown' });
  logger.error(errorMessage(err));
  process.exit(1);
});
