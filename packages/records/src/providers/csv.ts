import { readFile } from 'node:fs/promises';

import type { CallRecord } from '@callcoach/analytics';
import { createLogger } from '@callcoach/logger';
import { parse } from 'csv-parse/sync';

import { RecordSourceError, errorMessage } from '../errors.js';
import { normaliseRow } from '../normalize.js';
import type { FetchFn, RawRow, RecordSource } from '../types.js';

const logger = createLogger('records:csv');

export interface CsvRecordSourceOptions {
  /** CSV export URL; Google Sheets edit links are rewritten to their CSV export */
  url?: string;
  path?: string;
  fetchFn?: FetchFn;
}

const SHEET_LINK = /^https:\/\/docs\.google\.com\/spreadsheets\/d\/([\w-]+)/;

/** Rewrite a Google Sheets link to its CSV export URL, keeping the tab (`gid`) */
export function sheetExportUrl(url: string): string {
  const match = SHEET_LINK.exec(url);
  if (!match || url.includes('/export?')) return url;
  const gid = /[#&?]gid=(\d+)/.exec(url)?.[1];
  return `https://docs.google.com/spreadsheets/d/${match[1]}/export?format=csv${gid ? `&gid=${gid}` : ''}`;
}

const isRow = (value: unknown): value is RawRow => typeof value === 'object' && value !== null && !Array.isArray(value);

/** Parse CSV text with a header row into call records */
export function parseCsvRecords(text: string): CallRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
    });
  } catch (err: unknown) {
    throw new RecordSourceError('PARSE_FAILED', `Invalid CSV: ${errorMessage(err)}`, { cause: err });
  }
  if (!Array.isArray(parsed)) throw new RecordSourceError('PARSE_FAILED', 'CSV did not produce rows');
  return parsed.filter(isRow).map(normaliseRow);
}

/** Call records from a CSV export, fetched over HTTP or read from disk */
export class CsvRecordSource implements RecordSource {
  readonly name: string;
  private url?: string;
  private path?: string;
  private fetchFn: FetchFn;

  constructor(options: CsvRecordSourceOptions) {
    if (!options.url === !options.path) {
      throw new RecordSourceError('INVALID_CONFIG', 'CsvRecordSource needs exactly one of url or path');
    }
    this.url = options.url ? sheetExportUrl(options.url) : undefined;
    this.path = options.path;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.name = this.url ? 'csv:url' : 'csv:file';
  }

  async load(): Promise<CallRecord[]> {
    const text = this.url ? await this.download(this.url) : await this.read(this.path ?? '');
    const records = parseCsvRecords(text);
    logger.debug('Loaded call records', { source: this.name, count: records.length });
    return records;
  }

  private async download(url: string): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchFn(url, { headers: { Accept: 'text/csv' } });
    } catch (err: unknown) {
      throw new RecordSourceError('FETCH_FAILED', `Could not reach ${url}: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new RecordSourceError('FETCH_FAILED', `CSV export returned ${res.status} ${res.statusText}`.trim());
    }
    return res.text();
  }

  private async read(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (err: unknown) {
      throw new RecordSourceError('FETCH_FAILED', `Could not read ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
