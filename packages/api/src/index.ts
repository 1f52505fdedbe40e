// Middleware
export { errorHandler } from './middleware/index.js';

// Routes
export { allRoutes, healthRoutes, coachingRoutes } from './routes/index.js';
export type { RouteDefinition, CoachingRoutesOptions } from './routes/index.js';

// Server
export { matchRoute, createRequestListener, startServer, RequestError } from './server.js';
export type { IncomingRequest, OutgoingResponse, RouteMatch, ServeOptions } from './server.js';

// Types
export type { ApiError, ApiRequest, ApiResponse, RouteHandler } from './types.js';

// Sentry
export { SentryTransport } from './sentry.js';
