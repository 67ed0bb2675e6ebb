import type { ReportConfigInput } from '../core/types';

export type Flags = Record<string, string | boolean>;

const VALUE_FLAGS = new Set([
  'output',
  'summary',
  'config',
  'title',
  'description',
  'tester',
  'language',
  'theme',
]);

export const parseFlags = (args: string[]): Flags => {
  const flags: Flags = {};
  for (const arg of args) {
    if (arg === '--verbose') {
      flags.verbose = true;
      continue;
    }
    const match = /^--([a-z]+)=(.*)$/.exec(arg);
    if (match && VALUE_FLAGS.has(match[1])) {
      flags[match[1]] = match[2];
    }
  }
  return flags;
};

/** Report options given on the command line; they win over the config file. */
export const configOverrides = (flags: Flags): ReportConfigInput => {
  const overrides: ReportConfigInput = {};
  if (typeof flags.title === 'string') overrides.title = flags.title;
  if (typeof flags.description === 'string') overrides.description = flags.description;
  if (typeof flags.tester === 'string') overrides.tester = flags.tester;
  if (typeof flags.language === 'string') overrides.language = flags.language;
  if (typeof flags.theme === 'string') {
    if (flags.theme !== 'light' && flags.theme !== 'dark') {
      throw new Error(`Unknown theme: ${flags.theme} (expected light or dark)`);
    }
    overrides.theme = flags.theme;
  }
  return overrides;
};
