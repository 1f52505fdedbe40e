import type { RecordSource } from '@callcoach/records';

import type { RouteHandler } from '../types.js';
import { coachingRoutes } from './coaching.js';

/** Framework-agnostic route descriptor */
export interface RouteDefinition {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  handler: RouteHandler;
}

export { coachingRoutes };
export type { CoachingRoutesOptions } from './coaching.js';

/** Health check route */
export const healthRoutes = (): RouteDefinition[] => [
  {
    method: 'GET',
    path: '/health',
    handler: async (_req, res) => {
      res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
    },
  },
];

/** All v1 routes combined */
export const allRoutes = (options: { source: RecordSource; now?: () => Date }): RouteDefinition[] => [
  ...healthRoutes(),
  ...coachingRoutes(options),
];
