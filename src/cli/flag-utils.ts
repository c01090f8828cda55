import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    flags[token] = value;
    args.splice(index, 2);
  }
  return flags;
}

export function extractBooleanFlags(args: string[], keys: readonly string[]): Set<string> {
  const flags = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags.add(token);
    args.splice(index, 1);
  }
  return flags;
}

/** First value among `keys` (aliases of one flag), or undefined. */
export function firstFlag(flags: FlagMap, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = flags[key];
    if (value !== undefined) return value;
  }
  return undefined;
}

export function parseNumberFlag(
  flag: string,
  value: string | undefined,
  bounds: { min: number; max?: number; integer?: boolean }
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  const outOfRange = parsed < bounds.min || (bounds.max !== undefined && parsed > bounds.max);
  if (value.trim() === '' || !Number.isFinite(parsed) || outOfRange || (bounds.integer && !Number.isInteger(parsed))) {
    const range = bounds.max !== undefined ? `between ${bounds.min} and ${bounds.max}` : `at least ${bounds.min}`;
    throw new CliUsageError(`Flag '${flag}' expects ${bounds.integer ? 'an integer' : 'a number'} ${range}, got '${value}'.`);
  }
  return parsed;
}
