/** Plain stdout helpers for command output */

declare global {
  // eslint-disable-next-line no-var
  var __callcoach_quiet: boolean | undefined;
  // eslint-disable-next-line no-var
  var __callcoach_json: boolean | undefined;
}

export const log = (msg: string): void => {
  if (!globalThis.__callcoach_quiet) process.stdout.write(`${msg}\n`);
};

export const lines = (msgs: readonly string[]): void => {
  for (const msg of msgs) log(msg);
};

export const error = (msg: string): void => {
  if (!globalThis.__callcoach_quiet) process.stderr.write(`${msg}\n`);
};

export const json = (data: unknown): void => {
  if (!globalThis.__callcoach_quiet) process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
};

export const isJson = (): boolean => !!globalThis.__callcoach_json;
