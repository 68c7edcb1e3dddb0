import { DEFAULT_CONFIG_PATH } from '../config/reader.js';

/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = options(args).find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

/** Marks the end of options; everything after it is positional */
export const END_OF_OPTIONS = '--';

// Arguments before the `--` terminator
function options(args: string[]): string[] {
  const end = args.indexOf(END_OF_OPTIONS);
  return end === -1 ? args : args.slice(0, end);
}

/**
 * Arguments that are not flags, in order. Arguments after `--` are kept
 * even when they start with a dash.
 */
export function positionals(args: string[]): string[] {
  const end = args.indexOf(END_OF_OPTIONS);
  const before = options(args).filter((a) => !a.startsWith('-'));
  return end === -1 ? before : [...before, ...args.slice(end + 1)];
}

export function wantsHelp(args: string[]): boolean {
  const flags = options(args);
  return flags.includes('--help') || flags.includes('-h');
}

export function configPathFrom(args: string[]): string {
  return extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH;
}

/**
 * Parse comma-separated string into array.
 */
export function parseCommaSeparated(input: string | undefined): string[] {
  if (!input) return [];
  return input.split(',').map((s) => s.trim()).filter(Boolean);
}
