import { resolveSettings, type Settings } from './config.js';

// set once by the preAction hook from the global options
let sourceFlag: string | undefined;

export const setSourceFlag = (value: string | undefined): void => {
  sourceFlag = value;
};

export const currentSettings = (): Settings => resolveSettings({ source: sourceFlag });
