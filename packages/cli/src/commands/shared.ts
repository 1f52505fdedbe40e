import { filterByWindow, resolveWindow, type CallRecord, type TimeWindow } from '@callcoach/analytics';

import { currentSettings } from '../context.js';
import { createSource } from '../source.js';
import { spinner } from '../utils/ui.js';

export interface WindowOptions {
  window?: string;
}

export const WINDOW_HELP = 'time window (today, this-week, this-month, all-time)';

export async function loadRecords(): Promise<CallRecord[]> {
  const source = createSource(currentSettings());
  const spin = spinner('Loading call records').start();
  try {
    const records = await source.load();
    spin.stop();
    return records;
  } catch (err: unknown) {
    spin.fail('Could not load call records');
    throw err;
  }
}

export async function loadWindow(opts: WindowOptions): Promise<{ window: TimeWindow; all: CallRecord[]; records: CallRecord[] }> {
  const window = resolveWindow(opts.window);
  const all = await loadRecords();
  return { window, all, records: filterByWindow(all, window) };
}
