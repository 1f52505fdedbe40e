import {
  aggregateForTeam,
  buildAgentReport,
  buildCallReview,
  collectShareworthyMoments,
  filterByWindow,
  findCall,
  listAgents,
  resolveWindow,
  searchTranscripts,
  type CallRecord,
} from '@callcoach/analytics';
import { isInvalidatable, type RecordSource } from '@callcoach/records';

import { errorHandler } from '../middleware/error-handler.js';
import type { ApiRequest, ApiResponse } from '../types.js';
import type { RouteDefinition } from './index.js';

export interface CoachingRoutesOptions {
  source: RecordSource;
  /** Clock for time windows; tests pass a fixed date */
  now?: () => Date;
}

const TOP_N = 5;

const notFound = (res: ApiResponse, message: string) =>
  res.status(404).json({ error: { code: 'NOT_FOUND', message } });

/** /v1/coaching routes over a record source */
export const coachingRoutes = ({ source, now = () => new Date() }: CoachingRoutesOptions): RouteDefinition[] => {
  const load = async (req: ApiRequest): Promise<{ window: string; all: CallRecord[]; records: CallRecord[] }> => {
    const window = resolveWindow(req.query?.window);
    const all = await source.load();
    return { window, all, records: filterByWindow(all, window, now()) };
  };

  return [
    {
      method: 'GET',
      path: '/v1/coaching/team',
      handler: errorHandler(async (req, res) => {
        const { window, records } = await load(req);
        res.status(200).json({ window, ...aggregateForTeam(records) });
      }),
    },
    // literal routes first
    {
      method: 'GET',
      path: '/v1/coaching/agents',
      handler: errorHandler(async (_req, res) => {
        res.status(200).json({ agents: listAgents(await source.load()) });
      }),
    },
    {
      method: 'GET',
      path: '/v1/coaching/agents/:agent',
      handler: errorHandler(async (req, res) => {
        const agentName = req.params?.agent ?? '';
        const { window, all, records } = await load(req);
        if (!agentName || !all.some((r) => r.agentName === agentName)) {
          notFound(res, `No calls found for agent "${agentName}"`);
          return;
        }

        res.status(200).json({ window, ...buildAgentReport(records, agentName, TOP_N) });
      }),
    },
    {
      method: 'GET',
      path: '/v1/coaching/moments',
      handler: errorHandler(async (req, res) => {
        const { window, records } = await load(req);
        res.status(200).json({ window, moments: collectShareworthyMoments(records) });
      }),
    },
    {
      method: 'GET',
      path: '/v1/coaching/search',
      handler: errorHandler(async (req, res) => {
        const q = req.query?.q?.trim();
        if (!q) {
          res.status(400).json({ error: { code: 'INVALID_REQUEST', message: 'Missing "q" query parameter' } });
          return;
        }
        const { window, records } = await load(req);
        const results = searchTranscripts(records, q);
        res.status(200).json({ window, query: q, count: results.length, results });
      }),
    },
    {
      method: 'GET',
      path: '/v1/coaching/calls/:filename',
      handler: errorHandler(async (req, res) => {
        const filename = req.params?.filename ?? '';
        const call = findCall(await source.load(), filename);
        if (!call) {
          notFound(res, `No call named "${filename}"`);
          return;
        }
        res.status(200).json(buildCallReview(call));
      }),
    },
    {
      method: 'POST',
      path: '/v1/coaching/refresh',
      handler: errorHandler(async (_req, res) => {
        if (!isInvalidatable(source)) {
          res.status(200).json({ refreshed: false });
          return;
        }
        source.invalidate();
        res.status(200).json({ refreshed: true });
      }),
    },
  ];
};
