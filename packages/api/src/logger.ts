import { createLogger } from '@callcoach/logger';

/** Parent of the per-module API loggers */
export const apiLogger = createLogger('api');
