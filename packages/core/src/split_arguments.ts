// ============================================================================
// @argloom/core — Tokenizer & Token Stream
// ============================================================================
//
// Splits raw argv into an addressable, classified token stream. A short
// cluster like `-abc` is kept both as one `-abc` token (index `n`) and as
// `-a`, `-b`, `-c` (indexes `n.0`, `n.1`, `n.2`) so matching can pick either
// reading.
//
// Removal marks indexes consumed instead of deleting array slots, so no
// removal ever renumbers another token.
// ============================================================================

import { debug } from './logger.js';
import { nameKey, synopsis } from './names.js';
import type { InputOrigin } from './origin.js';
import { compareIndex, indexKey, tokenIndex } from './origin.js';
import type { Name, OptionToken, Token, TokenEntry, TokenIndex } from './types.js';

const NUMERIC_LITERAL = /^(\d+\.?\d*|\.\d+)$/;
const ALL_DIGITS = /^\d+$/;

/** A value popped from the stream, with the index it came from. */
export interface PoppedValue {
  readonly index: TokenIndex;
  readonly value: string;
}

/** A leftover token, coalesced for "unexpected argument" reporting. */
export interface ExtraElement {
  readonly index: TokenIndex;
  readonly text: string;
}

/** `--foo`, `-f`, `--foo=bar` as typed. */
export function describeOptionToken(option: OptionToken): string {
  return option.kind === 'name'
    ? synopsis(option.name)
    : `${synopsis(option.name)}=${option.value}`;
}

/** Value tokens and unresolved negative numbers can both fill a value slot. */
export function isValueLike(token: Token): boolean {
  return token.kind === 'value' || token.kind === 'possibleNegative';
}

/** Raw text of a value-like token. */
export function valueText(token: Token): string | undefined {
  switch (token.kind) {
    case 'value':
      return token.value;
    case 'possibleNegative':
      return token.raw;
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function withAttachedValue(remainder: string, makeName: (base: string) => Name): OptionToken | undefined {
  const equalIdx = remainder.indexOf('=');
  if (equalIdx === -1) {
    return { kind: 'name', name: makeName(remainder) };
  }
  const base = remainder.slice(0, equalIdx);
  if (base.length === 0) return undefined;
  return { kind: 'nameWithValue', name: makeName(base), value: remainder.slice(equalIdx + 1) };
}

/**
 * Classify one raw argument (not after a terminator).
 */
export function classifyArgument(arg: string, position: number): TokenEntry[] {
  const index = tokenIndex(position);

  if (arg === '--') {
    return [{ index, token: { kind: 'terminator' } }];
  }

  if (arg.startsWith('--')) {
    const option = withAttachedValue(arg.slice(2), (base) => ({ kind: 'long', value: base }));
    return option
      ? [{ index, token: { kind: 'option', option } }]
      : [{ index, token: { kind: 'value', value: arg } }];
  }

  if (!arg.startsWith('-') || arg.length === 1) {
    return [{ index, token: { kind: 'value', value: arg } }];
  }

  const remainder = arg.slice(1);

  if (remainder.includes('=')) {
    const option = withAttachedValue(remainder, (base) =>
      Array.from(base).length === 1
        ? { kind: 'short', value: base }
        : { kind: 'longWithSingleDash', value: base },
    );
    return option
      ? [{ index, token: { kind: 'option', option } }]
      : [{ index, token: { kind: 'value', value: arg } }];
  }

  const chars = Array.from(remainder);

  if (chars.length === 1) {
    const option: OptionToken = { kind: 'name', name: { kind: 'short', value: remainder } };
    return ALL_DIGITS.test(remainder)
      ? [{ index, token: { kind: 'possibleNegative', raw: arg, option } }]
      : [{ index, token: { kind: 'option', option } }];
  }

  const whole: OptionToken = { kind: 'name', name: { kind: 'longWithSingleDash', value: remainder } };
  const numeric = NUMERIC_LITERAL.test(remainder);
  const result: TokenEntry[] = [
    {
      index,
      token: numeric ? { kind: 'possibleNegative', raw: arg, option: whole } : { kind: 'option', option: whole },
    },
  ];

  // `-1.5` has no short-flag reading; `-15` and `-abc` do.
  if (numeric && !ALL_DIGITS.test(remainder)) {
    return result;
  }

  chars.forEach((char, offset) => {
    result.push({
      index: tokenIndex(position, offset),
      token: { kind: 'option', option: { kind: 'name', name: { kind: 'short', value: char } } },
    });
  });
  return result;
}

/**
 * Split argv (without the program name) into a token stream. Never fails:
 * odd-looking input is kept for the matcher to reject as unknown.
 *
 * @example
 * ```ts
 * splitArguments(['--foo', '--', '--bar']).toString()
 * // → "[0] --foo [1] -- [2] '--bar'"
 * ```
 */
export function splitArguments(argv: readonly string[]): TokenStream {
  const entries: TokenEntry[] = [];
  let terminated = false;

  argv.forEach((arg, position) => {
    if (terminated) {
      entries.push({ index: tokenIndex(position), token: { kind: 'value', value: arg } });
      return;
    }
    const classified = classifyArgument(arg, position);
    entries.push(...classified);
    if (classified[0]?.token.kind === 'terminator') {
      terminated = true;
    }
  });

  debug(`splitArguments: ${argv.length} arguments → ${entries.length} tokens`, {
    arguments: argv.length,
    tokens: entries.length,
    terminated,
  });
  return new TokenStream(argv, entries);
}

// ---------------------------------------------------------------------------
// Token Stream
// ---------------------------------------------------------------------------

/**
 * Ordered, addressable tokens plus the immutable original input.
 *
 * Removing a `complete` index removes the whole cluster. Removing a `sub`
 * index removes that short option and commits the cluster to its short
 * reading, so its `complete` token is consumed as well; sibling subs stay.
 */
export class TokenStream {
  readonly originalInput: readonly string[];
  private readonly entries: readonly TokenEntry[];
  private readonly consumed: Set<string>;

  constructor(originalInput: readonly string[], entries: readonly TokenEntry[], consumed?: Iterable<string>) {
    this.originalInput = originalInput;
    this.entries = entries;
    this.consumed = new Set(consumed);
  }

  /** Independent copy sharing the (immutable) entries. */
  clone(): TokenStream {
    return new TokenStream(this.originalInput, this.entries, this.consumed);
  }

  /** The unconsumed entries, in stream order. */
  get elements(): TokenEntry[] {
    return this.entries.filter((e) => !this.consumed.has(indexKey(e.index)));
  }

  get isEmpty(): boolean {
    return this.firstRemaining(0) === -1;
  }

  get count(): number {
    return this.elements.length;
  }

  /** False when empty, or when only the `--` terminator is left. */
  get containsNonTerminatorArguments(): boolean {
    const remaining = this.elements;
    if (remaining.length === 0) return false;
    if (remaining.length > 1) return true;
    return remaining[0].token.kind !== 'terminator';
  }

  /** The entry at `index`, if it was produced and is still present. */
  entry(index: TokenIndex): TokenEntry | undefined {
    const key = indexKey(index);
    if (this.consumed.has(key)) return undefined;
    return this.entries.find((e) => indexKey(e.index) === key);
  }

  originalInputAt(index: TokenIndex): string | undefined {
    return this.originalInput[index.input];
  }

  peekNext(): TokenEntry | undefined {
    const at = this.firstRemaining(0);
    return at === -1 ? undefined : this.entries[at];
  }

  /** Pop exactly the next entry; a cluster's sub tokens stay behind. */
  popNext(): TokenEntry | undefined {
    const next = this.peekNext();
    if (next) this.consumed.add(indexKey(next.index));
    return next;
  }

  /**
   * Pop the next complete element if it is a value.
   *
   * With `after`, looks at the first complete element following that index,
   * so `-fn f-value n-value` hands each packed option its own value. Without
   * it, looks at the very next element: `foo --b` pops `foo`, `--b foo` pops
   * nothing.
   */
  popNextElementIfValue(after?: TokenIndex): PoppedValue | undefined {
    const candidate =
      after === undefined
        ? this.peekNext()
        : this.remainingAfter(after).find((e) => e.index.sub === 'complete');
    if (!candidate) return undefined;
    const value = valueText(candidate.token);
    if (value === undefined) return undefined;
    this.remove(candidate.index);
    return { index: candidate.index, value };
  }

  /** Pop the next value anywhere after `after` (or anywhere at all). */
  popNextValue(after?: TokenIndex): PoppedValue | undefined {
    const pool = after === undefined ? this.elements : this.remainingAfter(after);
    const candidate = pool.find((e) => e.index.sub === 'complete' && isValueLike(e.token));
    if (!candidate) return undefined;
    const value = valueText(candidate.token);
    if (value === undefined) return undefined;
    this.remove(candidate.index);
    return { index: candidate.index, value };
  }

  /** Peek the next value-like element without consuming it. */
  peekNextValue(): PoppedValue | undefined {
    const candidate = this.elements.find((e) => e.index.sub === 'complete' && isValueLike(e.token));
    if (!candidate) return undefined;
    const value = valueText(candidate.token);
    return value === undefined ? undefined : { index: candidate.index, value };
  }

  /**
   * Pop the next complete element as a value, whatever it looks like.
   * For `--a --b foo` after `--a`, this yields `--b`, then `foo`.
   */
  popNextElementAsValue(after: TokenIndex): PoppedValue | undefined {
    const next = this.remainingAfter(after).find((e) => e.index.sub === 'complete');
    if (!next) return undefined;
    this.remove(next.index);
    return { index: next.index, value: this.originalInput[next.index.input] ?? '' };
  }

  /**
   * For `-Ddebug` matched at `sub(0)`, the joined value `debug`, addressed by
   * the complete index.
   */
  extractJoinedElement(at: TokenIndex): PoppedValue | undefined {
    if (at.sub !== 0) return undefined;
    const raw = this.originalInput[at.input];
    if (raw === undefined) return undefined;
    const chars = Array.from(raw);
    return { index: tokenIndex(at.input), value: chars.slice(2).join('') };
  }

  /** Remove the token(s) at `index`; see the class note for clusters. */
  remove(index: TokenIndex): void {
    if (index.sub === 'complete') {
      for (const e of this.entries) {
        if (e.index.input === index.input) this.consumed.add(indexKey(e.index));
      }
      return;
    }
    this.consumed.add(indexKey(index));
    this.consumed.add(indexKey(tokenIndex(index.input)));
  }

  removeAll(origin: InputOrigin): void {
    for (const index of origin.elements) {
      this.remove(index);
    }
  }

  /** Drop only the `sub` readings at `input`, keeping the complete token. */
  removeSubElements(input: number): void {
    for (const e of this.entries) {
      if (e.index.input === input && e.index.sub !== 'complete') {
        this.consumed.add(indexKey(e.index));
      }
    }
  }

  /** True when an unconsumed option is spelled as one of `names`. */
  contains(names: readonly Name[]): boolean {
    const wanted = new Set(names.map(nameKey));
    return this.elements.some(
      (e) => e.token.kind === 'option' && wanted.has(nameKey(e.token.option.name)),
    );
  }

  /** Whether the argument at `input` was split into short sub tokens. */
  hasSubElements(input: number): boolean {
    return this.entries.some((e) => e.index.input === input && e.index.sub !== 'complete');
  }

  /**
   * Leftovers for error reporting: every non-terminator element that is
   * complete, or a sub whose cluster was split apart.
   */
  coalescedExtraElements(): ExtraElement[] {
    const remaining = this.elements;
    const completeInputs = new Set(
      remaining.filter((e) => e.index.sub === 'complete').map((e) => e.index.input),
    );
    return remaining
      .filter((e) => e.token.kind !== 'terminator')
      .filter((e) => e.index.sub === 'complete' || !completeInputs.has(e.index.input))
      .map((e) => {
        if (e.index.sub !== 'complete' && e.token.kind === 'option') {
          return { index: e.index, text: describeOptionToken(e.token.option) };
        }
        return { index: e.index, text: this.originalInput[e.index.input] ?? '' };
      });
  }

  toString(): string {
    const remaining = this.elements;
    if (remaining.length === 0) return '<empty>';
    return remaining
      .map((e) => {
        const at = `[${indexKey(e.index)}]`;
        switch (e.token.kind) {
          case 'option':
            return e.token.option.kind === 'name'
              ? `${at} ${synopsis(e.token.option.name)}`
              : `${at} ${synopsis(e.token.option.name)}='${e.token.option.value}'`;
          case 'possibleNegative':
            return `${at} ${e.token.raw}?`;
          case 'value':
            return `${at} '${e.token.value}'`;
          case 'terminator':
            return `${at} --`;
        }
      })
      .join(' ');
  }

  private firstRemaining(from: number): number {
    for (let i = from; i < this.entries.length; i++) {
      if (!this.consumed.has(indexKey(this.entries[i].index))) return i;
    }
    return -1;
  }

  private remainingAfter(after: TokenIndex): TokenEntry[] {
    return this.elements.filter((e) => compareIndex(e.index, after) > 0);
  }
}
