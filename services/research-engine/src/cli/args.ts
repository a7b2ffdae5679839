/**
 * Minimal `--key value` / `--flag` argument parsing shared by the CLIs.
 */

import { ValidationError } from '@quantsweep/shared-utils';

export type ParsedArgs = Record<string, string | true>;

/**
 * A token without a following value (or followed by another --key) is a boolean flag.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      throw new ValidationError(`Unexpected argument "${token}"`);
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      parsed[key] = true;
    } else {
      parsed[key] = next;
      i++;
    }
  }
  return parsed;
}

export function optionalString(args: ParsedArgs, key: string): string | undefined {
  const value = args[key];
  if (value === true) {
    throw new ValidationError(`--${key} requires a value`, key);
  }
  return value;
}

export function requireString(args: ParsedArgs, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`--${key} is required`, key);
  }
  return value;
}

export function optionalInteger(args: ParsedArgs, key: string): number | undefined {
  const raw = optionalString(args, key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`--${key} must be an integer (got "${raw}")`, key);
  }
  return value;
}

export function optionalNumber(args: ParsedArgs, key: string): number | undefined {
  const raw = optionalString(args, key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ValidationError(`--${key} must be a number (got "${raw}")`, key);
  }
  return value;
}

export function flag(args: ParsedArgs, key: string): boolean {
  const value = args[key];
  return value === true || value === 'true';
}
