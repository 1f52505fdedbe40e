import * as Sentry from '@sentry/node';

import { apiLogger } from '../logger.js';
import type { ApiRequest, ApiResponse, RouteHandler } from '../types.js';

const logger = apiLogger.child('error-handler');

type ErrorLike = { message?: unknown; code?: unknown; status?: unknown };

const isErrorLike = (e: unknown): e is ErrorLike => typeof e === 'object' && e !== null;

/** Wraps a handler to catch errors and return consistent error format */
export function errorHandler(handler: RouteHandler): RouteHandler {
  return async (req: ApiRequest, res: ApiResponse) => {
    try {
      await handler(req, res);
    } catch (err: unknown) {
      const fields: ErrorLike = isErrorLike(err) ? err : {};
      const message = typeof fields.message === 'string' && fields.message ? fields.message : 'Internal server error';
      const code = typeof fields.code === 'string' && fields.code ? fields.code : 'internal_error';
      const status = typeof fields.status === 'number' && fields.status >= 400 ? fields.status : 500;

      logger.error(message, { code, status, path: req.path });

      if (status >= 500) {
        Sentry.captureException(err instanceof Error ? err : new Error(message));
      }

      res.status(status).json({ error: { code, message } });
    }
  };
}
