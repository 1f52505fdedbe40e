export type RecordSourceErrorCode = 'FETCH_FAILED' | 'PARSE_FAILED' | 'QUERY_FAILED' | 'INVALID_CONFIG';

const STATUS: Record<RecordSourceErrorCode, number> = {
  FETCH_FAILED: 502,
  PARSE_FAILED: 502,
  QUERY_FAILED: 503,
  INVALID_CONFIG: 500,
};

export class RecordSourceError extends Error {
  code: RecordSourceErrorCode;
  /** HTTP status the API answers with when this error reaches a route */
  status: number;

  constructor(code: RecordSourceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.status = STATUS[code];
    this.name = 'RecordSourceError';
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
