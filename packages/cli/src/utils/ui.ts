import { intro, log as clackLog, outro } from '@clack/prompts';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import { isJson } from '../output.js';

const silent = (): boolean => isJson() || !!globalThis.__callcoach_quiet;

export function printBanner(title: string): void {
  if (!silent()) intro(chalk.bold.white(title));
}

export function printEnd(message = 'coach the gaps, celebrate the wins'): void {
  if (!silent()) outro(chalk.white(message));
}

export function spinner(text: string): Ora {
  return ora({ text, color: 'white', isSilent: silent() });
}

export function success(msg: string): void {
  if (!silent()) clackLog.success(msg);
}

export function info(msg: string): void {
  if (!silent()) clackLog.info(msg);
}

export const heading = (text: string): string => chalk.bold(text);

export const muted = (text: string): string => chalk.dim(text);

/** Colour a 0-10 score by tier: green from 7, yellow from 5, red below */
export const tierColor = (score: number, text: string): string => {
  if (score >= 7) return chalk.green(text);
  if (score >= 5) return chalk.yellow(text);
  return chalk.red(text);
};

export const outcomeIcon = (outcome: string): string => {
  switch (outcome) {
    case 'closed':
      return chalk.green('●');
    case 'lost':
      return chalk.red('●');
    case 'follow-up-scheduled':
      return chalk.yellow('●');
    case 'needs-callback':
      return chalk.yellow('○');
    default:
      return chalk.dim('·');
  }
};
