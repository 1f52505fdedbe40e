import type { ApiRequest, ApiResponse } from './types.js';

export interface FakeResponse extends ApiResponse {
  statusCode: number;
  body: unknown;
}

export function fakeResponse(): FakeResponse {
  const res: FakeResponse = {
    statusCode: 0,
    body: undefined,
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(data) {
      res.body = data;
    },
  };
  return res;
}

export const fakeRequest = (overrides: Partial<ApiRequest> = {}): ApiRequest => ({
  method: 'GET',
  path: '/',
  headers: {},
  ...overrides,
});
