import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { isRecord } from '@callcoach/analytics';

import { CliError, errorMessage } from './errors.js';

export type ConfigScope = 'global' | 'project';
export type ConfigData = Record<string, unknown>;
export type SourceType = 'csv' | 'postgres';

/** Effective settings after merging flags, env and config files */
export interface Settings {
  source: {
    type: SourceType;
    /** CSV URL or path, or a Postgres connection string */
    location?: string;
    table?: string;
  };
  cacheTtlMs: number;
  posthogKey?: string;
  server: { port: number; host: string };
}

const configDir = (): string => process.env.CALLCOACH_HOME ?? path.join(os.homedir(), '.callcoach');

const configPath = (scope: ConfigScope): string =>
  scope === 'global' ? path.join(configDir(), 'config.json') : path.resolve('callcoach.config.json');

const SENSITIVE_KEYS = new Set(['source.url', 'telemetry.posthogKey']);

export const KNOWN_KEYS = [
  'source.type',
  'source.url',
  'source.table',
  'cache.ttlSeconds',
  'telemetry.posthogKey',
  'server.port',
  'server.host',
] as const;

export const loadConfig = (scope: ConfigScope): ConfigData => {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath(scope), 'utf-8');
  } catch (_err: unknown) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new CliError('INVALID_CONFIG', `Could not parse ${configPath(scope)}: ${errorMessage(err)}`);
  }
  return isRecord(parsed) ? parsed : {};
};

export const saveConfig = (scope: ConfigScope, config: ConfigData): void => {
  const filePath = configPath(scope);
  if (scope === 'global') fs.mkdirSync(configDir(), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
};

// dot-notation helpers
export const getByPath = (obj: ConfigData, dotPath: string): unknown => {
  let current: unknown = obj;
  for (const part of dotPath.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
};

export const setByPath = (obj: ConfigData, dotPath: string, value: unknown): void => {
  const parts = dotPath.split('.');
  const last = parts.pop() ?? dotPath;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigData = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
};

export const unsetByPath = (obj: ConfigData, dotPath: string): boolean => {
  const parts = dotPath.split('.');
  const last = parts.pop() ?? dotPath;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (!isRecord(next)) return false;
    current = next;
  }
  if (!(last in current)) return false;
  delete current[last];
  return true;
};

export const isSensitive = (key: string): boolean => SENSITIVE_KEYS.has(key);

export const flattenConfig = (obj: ConfigData, prefix = ''): Array<{ key: string; value: unknown }> => {
  const entries: Array<{ key: string; value: unknown }> = [];
  for (const [k, v] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${k}` : k;
    if (isRecord(v)) {
      entries.push(...flattenConfig(v, fullKey));
    } else {
      entries.push({ key: fullKey, value: v });
    }
  }
  return entries;
};

export interface ConfigIssue {
  key: string;
  level: 'error' | 'warning';
  message: string;
}

export const validateConfig = (config: ConfigData): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];
  const known = new Set<string>(KNOWN_KEYS);

  for (const { key } of flattenConfig(config)) {
    if (!known.has(key)) issues.push({ key, level: 'warning', message: `unknown key: ${key}` });
  }

  const type = getByPath(config, 'source.type');
  if (type !== undefined && type !== 'csv' && type !== 'postgres') {
    issues.push({ key: 'source.type', level: 'error', message: 'must be csv or postgres' });
  }

  const ttl = getByPath(config, 'cache.ttlSeconds');
  if (ttl !== undefined && (typeof ttl !== 'number' || ttl < 0)) {
    issues.push({ key: 'cache.ttlSeconds', level: 'error', message: 'must be a number of seconds (0 or more)' });
  }

  const port = getByPath(config, 'server.port');
  if (port !== undefined && (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535)) {
    issues.push({ key: 'server.port', level: 'error', message: 'port must be 1-65535' });
  }

  if (getByPath(config, 'source.url') === undefined && type !== 'postgres') {
    issues.push({ key: 'source.url', level: 'warning', message: 'no CSV export configured; pass --source or set source.url' });
  }

  return issues;
};

const str = (value: unknown): string | undefined => (typeof value === 'string' && value.trim() ? value.trim() : undefined);

const num = (value: unknown): number | undefined => {
  const n = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
};

export const DEFAULT_TTL_SECONDS = 60;

/**
 * Merge settings. Precedence, highest first: command-line flags,
 * environment (`CALLCOACH_SOURCE`, `CALLCOACH_CACHE_TTL`, `DATABASE_URL`),
 * project file, global file.
 */
export function resolveSettings(
  flags: { source?: string },
  env: NodeJS.ProcessEnv = process.env,
  files: { global: ConfigData; project: ConfigData } = { global: loadConfig('global'), project: loadConfig('project') },
): Settings {
  const pick = (key: string): unknown => getByPath(files.project, key) ?? getByPath(files.global, key);

  const configuredType = pick('source.type') === 'postgres' ? 'postgres' : 'csv';
  const explicit = str(flags.source) ?? str(env.CALLCOACH_SOURCE);

  let type: SourceType = configuredType;
  let location: string | undefined;
  if (explicit) {
    type = /^postgres(ql)?:\/\//.test(explicit) ? 'postgres' : 'csv';
    location = explicit;
  } else if (configuredType === 'postgres') {
    location = str(env.DATABASE_URL) ?? str(pick('source.url'));
  } else {
    location = str(pick('source.url'));
  }

  const ttlSeconds = num(env.CALLCOACH_CACHE_TTL) ?? num(pick('cache.ttlSeconds')) ?? DEFAULT_TTL_SECONDS;

  return {
    source: { type, location, table: str(pick('source.table')) },
    cacheTtlMs: Math.max(0, ttlSeconds) * 1000,
    posthogKey: str(env.CALLCOACH_POSTHOG_KEY) ?? str(pick('telemetry.posthogKey')),
    server: {
      port: num(pick('server.port')) ?? 3000,
      host: str(pick('server.host')) ?? '127.0.0.1',
    },
  };
}
