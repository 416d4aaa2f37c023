// ============================================================================
// @argloom/core — Names
// ============================================================================

import type { Name } from './types.js';

export function long(value: string): Name {
  return { kind: 'long', value };
}

export function short(value: string, options?: { allowingJoined?: boolean }): Name {
  if (Array.from(value).length !== 1) {
    throw new RangeError(`Short names must be a single character, got "${value}".`);
  }
  return options?.allowingJoined ? { kind: 'short', value, allowingJoined: true } : { kind: 'short', value };
}

export function longWithSingleDash(value: string): Name {
  return { kind: 'longWithSingleDash', value };
}

/**
 * Parse a name as it would be typed: `--verbose`, `-v` or `-verbose`.
 *
 * @example
 * ```ts
 * parseName('--dry-run') // → { kind: 'long', value: 'dry-run' }
 * parseName('-n')        // → { kind: 'short', value: 'n' }
 * ```
 */
export function parseName(spelling: string): Name {
  if (spelling.startsWith('--') && spelling.length > 2) {
    return long(spelling.slice(2));
  }
  if (spelling.startsWith('-') && spelling.length > 1) {
    const rest = spelling.slice(1);
    return Array.from(rest).length === 1 ? short(rest) : longWithSingleDash(rest);
  }
  throw new RangeError(`"${spelling}" is not a dash-prefixed name.`);
}

/** The name as the user types it: `--foo`, `-f`, `-foo`. */
export function synopsis(name: Name): string {
  return name.kind === 'long' ? `--${name.value}` : `-${name.value}`;
}

/**
 * Lookup key used for matching; ignores `allowingJoined`, since input is
 * never tokenized as joined.
 */
export function nameKey(name: Name): string {
  switch (name.kind) {
    case 'long':
      return `--${name.value}`;
    case 'short':
      return `-${name.value}`;
    case 'longWithSingleDash':
      return `-:${name.value}`;
  }
}

export function namesEqual(a: Name, b: Name): boolean {
  return nameKey(a) === nameKey(b);
}

export function isShort(name: Name): boolean {
  return name.kind === 'short';
}

export function allowsJoined(name: Name): boolean {
  return name.kind === 'short' && name.allowingJoined === true;
}

/** Prefer a non-short name for synopsis and value-name purposes. */
export function preferredName(names: readonly Name[]): Name | undefined {
  return names.find((n) => !isShort(n)) ?? names[0];
}
