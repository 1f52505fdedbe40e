import type { Command } from 'commander';

import {
  flattenConfig,
  getByPath,
  isSensitive,
  loadConfig,
  saveConfig,
  setByPath,
  unsetByPath,
  validateConfig,
  type ConfigScope,
} from '../config.js';
import { CliError } from '../errors.js';
import { fail } from '../cli-utils.js';
import { isJson, json, log } from '../output.js';
import { success } from '../utils/ui.js';

const MASK = '••••••••';

const resolveScope = (opts: { scope?: string }): ConfigScope => (opts.scope === 'project' ? 'project' : 'global');

export const parseValue = (raw: string): unknown => {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  const num = Number(raw);
  if (!Number.isNaN(num) && raw.trim() !== '') return num;
  return raw;
};

const display = (key: string, value: unknown, showSensitive?: boolean): unknown =>
  isSensitive(key) && !showSensitive ? MASK : value;

export function renderConfigList(config: Record<string, unknown>, scope: ConfigScope, showSensitive = false): string[] {
  const entries = flattenConfig(config);
  if (!entries.length) return [`no config found (${scope})`];
  return [`config (${scope}):`, '', ...entries.map(({ key, value }) => `  ${key} = ${String(display(key, value, showSensitive))}`)];
}

const configList = async (opts: { scope?: string; showSensitive?: boolean }): Promise<void> => {
  try {
    const scope = resolveScope(opts);
    const config = loadConfig(scope);

    if (isJson()) {
      const obj: Record<string, unknown> = {};
      for (const { key, value } of flattenConfig(config)) obj[key] = display(key, value, opts.showSensitive);
      json(obj);
      return;
    }
    for (const line of renderConfigList(config, scope, opts.showSensitive)) log(line);
  } catch (err: unknown) {
    fail(err, 'config list');
  }
};

const configGet = async (key: string, opts: { scope?: string; showSensitive?: boolean }): Promise<void> => {
  try {
    const value = getByPath(loadConfig(resolveScope(opts)), key);

    if (value === undefined) {
      if (isJson()) {
        json({ key, value: null });
        return;
      }
      throw new CliError('NOT_FOUND', `key not found: ${key}`);
    }

    if (isJson()) {
      json({ key, value: display(key, value, opts.showSensitive) });
      return;
    }
    log(String(display(key, value, opts.showSensitive)));
  } catch (err: unknown) {
    fail(err, 'config get');
  }
};

const configSet = async (key: string, rawValue: string, opts: { scope?: string }): Promise<void> => {
  try {
    const scope = resolveScope(opts);
    const config = loadConfig(scope);
    const value = parseValue(rawValue);
    setByPath(config, key, value);

    const errors = validateConfig(config).filter((i) => i.level === 'error');
    if (errors.length) throw new CliError('INVALID_CONFIG', `${errors[0].key}: ${errors[0].message}`);
    saveConfig(scope, config);

    if (isJson()) {
      json({ key, value: display(key, value), scope });
      return;
    }
    success(`set ${key} = ${String(display(key, value))} (${scope})`);
  } catch (err: unknown) {
    fail(err, 'config set');
  }
};

const configUnset = async (key: string, opts: { scope?: string }): Promise<void> => {
  try {
    const scope = resolveScope(opts);
    const config = loadConfig(scope);

    if (!unsetByPath(config, key)) {
      if (isJson()) {
        json({ key, removed: false });
        return;
      }
      throw new CliError('NOT_FOUND', `key not found: ${key}`);
    }

    saveConfig(scope, config);
    if (isJson()) {
      json({ key, removed: true, scope });
      return;
    }
    success(`unset ${key} (${scope})`);
  } catch (err: unknown) {
    fail(err, 'config unset');
  }
};

const configValidate = async (opts: { scope?: string }): Promise<void> => {
  try {
    const issues = validateConfig(loadConfig(resolveScope(opts)));
    const errors = issues.filter((i) => i.level === 'error');

    if (isJson()) {
      json({ valid: errors.length === 0, issues });
    } else if (!issues.length) {
      log('config is valid');
    } else {
      for (const i of issues) log(`  ${i.level === 'error' ? '✗' : '⚠'} ${i.key}: ${i.message}`);
    }

    if (errors.length) process.exitCode = 1;
  } catch (err: unknown) {
    fail(err, 'config validate');
  }
};

export const registerConfig = (program: Command): void => {
  const config = program.command('config').description('manage callcoach configuration');

  config
    .command('list')
    .description('show all config values')
    .option('--scope <scope>', 'config scope (global or project)', 'global')
    .option('--show-sensitive', 'reveal sensitive values')
    .action(configList);

  config
    .command('get')
    .description('get a config value by key (dot notation)')
    .argument('<key>', 'config key (e.g. source.url)')
    .option('--scope <scope>', 'config scope (global or project)', 'global')
    .option('--show-sensitive', 'reveal sensitive values')
    .action(configGet);

  config
    .command('set')
    .description('set a config value')
    .argument('<key>', 'config key (e.g. cache.ttlSeconds)')
    .argument('<value>', 'value to set')
    .option('--scope <scope>', 'config scope (global or project)', 'global')
    .action(configSet);

  config
    .command('unset')
    .description('remove a config value')
    .argument('<key>', 'config key to remove')
    .option('--scope <scope>', 'config scope (global or project)', 'global')
    .action(configUnset);

  config
    .command('validate')
    .description('check config for errors')
    .option('--scope <scope>', 'config scope (global or project)', 'global')
    .action(configValidate);
};
