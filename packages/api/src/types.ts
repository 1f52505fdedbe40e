/** Standard API error response */
export interface ApiError {
  error: { code: string; message: string };
}

/** Generic request abstraction */
export interface ApiRequest {
  method: string;
  path: string;
  headers: Record<string, string | undefined>;
  body?: unknown;
  query?: Record<string, string>;
  /** Path parameters, e.g. `agent` for `/v1/coaching/agents/:agent` */
  params?: Record<string, string>;
}

/** Generic response helpers */
export interface ApiResponse {
  status(code: number): ApiResponse;
  json(data: unknown): void;
}

export type RouteHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;
