import { SentryTransport, allRoutes, startServer } from '@callcoach/api';
import { registerTransport } from '@callcoach/logger';
import type { Command } from 'commander';

import { currentSettings } from '../context.js';
import { fail } from '../cli-utils.js';
import { createSource } from '../source.js';
import { info } from '../utils/ui.js';

export const registerServe = (program: Command): void => {
  program
    .command('serve')
    .description('serve the coaching API over HTTP')
    .option('--port <port>', 'port to listen on')
    .option('--host <host>', 'interface to bind')
    .action(async (opts: { port?: string; host?: string }) => {
      try {
        const settings = currentSettings();
        const source = createSource(settings);
        const port = opts.port ? Number.parseInt(opts.port, 10) : settings.server.port;
        const host = opts.host ?? settings.server.host;

        if (process.env.SENTRY_DSN) registerTransport(new SentryTransport());

        // API logs go to stdout while serving
        globalThis.__callcoach_cli_mode = false;
        await startServer(allRoutes({ source }), { port, host });
        info(`coaching API on http://${host}:${port}`);
      } catch (err: unknown) {
        fail(err, 'serve');
      }
    });
};
