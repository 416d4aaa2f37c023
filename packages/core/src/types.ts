// ============================================================================
// @argloom/core — Type Definitions
// ============================================================================
//
// Central type definitions for the argloom pipeline.
// Tokens, indexes, names and argument definitions are declared here so the
// tokenizer, matcher and validators agree on one vocabulary.
// ============================================================================

import type { BoundValues } from './bound_values.js';
import type { InputOrigin } from './origin.js';

// ---- Names ----

/**
 * A name an option or flag can be spelled with on the command line.
 * - `long`               — `--name`
 * - `short`              — `-n` (clusters like `-abc` split into shorts)
 * - `longWithSingleDash` — `-name`
 */
export type Name =
  | { readonly kind: 'long'; readonly value: string }
  | { readonly kind: 'short'; readonly value: string; readonly allowingJoined?: boolean }
  | { readonly kind: 'longWithSingleDash'; readonly value: string };

/** A `-f`, `--foo`, or `--foo=bar` as seen on the command line. */
export type OptionToken =
  | { readonly kind: 'name'; readonly name: Name }
  | { readonly kind: 'nameWithValue'; readonly name: Name; readonly value: string };

// ---- Tokens ----

/** One classified unit of the split argument vector. */
export type Token =
  | { readonly kind: 'value'; readonly value: string }
  | { readonly kind: 'option'; readonly option: OptionToken }
  | { readonly kind: 'terminator' }
  | { readonly kind: 'possibleNegative'; readonly raw: string; readonly option: OptionToken };

/** Position inside a combined short-option cluster, or the whole argument. */
export type SubIndex = 'complete' | number;

/**
 * Stable address of a token: `input` is the raw argv position, `sub` the
 * offset of a synthesized short option inside a cluster.
 */
export interface TokenIndex {
  readonly input: number;
  readonly sub: SubIndex;
}

/** A token with its address. */
export interface TokenEntry {
  readonly index: TokenIndex;
  readonly token: Token;
}

// ---- Argument Definitions ----

export type ArgumentKind = 'positional' | 'option' | 'flag';

export type Arity = 'scalar' | 'array';

/**
 * - `default` — listed everywhere
 * - `hidden`  — only listed by the hidden help
 * - `private` — never listed, never suggested
 */
export type Visibility = 'default' | 'hidden' | 'private';

/**
 * How a value-taking argument finds its value(s).
 * - `next`             — the next element must be a value
 * - `scanningForValue` — the next value anywhere after the option
 * - `unconditional`    — the next element, even if it looks like an option
 * - `upToNextOption`   — consecutive values until the next option
 * - `remaining`        — every remaining element
 */
export type ParsingStrategy =
  | 'next'
  | 'scanningForValue'
  | 'unconditional'
  | 'upToNextOption'
  | 'remaining';

/** How repeated flags that write the same key are reconciled. */
export type FlagExclusivity = 'exclusive' | 'chooseFirst' | 'chooseLast';

/** Updates a key from an argument that takes no value. */
export type NullaryUpdate = (origin: InputOrigin, name: Name | undefined, values: BoundValues) => void;

/** Updates a key from an argument that takes a value. */
export type UnaryUpdate = (
  origin: InputOrigin,
  name: Name | undefined,
  raw: string,
  values: BoundValues,
) => void;

export type ArgumentUpdate =
  | { readonly arity: 'nullary'; readonly apply: NullaryUpdate }
  | { readonly arity: 'unary'; readonly apply: UnaryUpdate };

/** Sets the initial (default) value of a definition before matching. */
export type InitialValue = (origin: InputOrigin, values: BoundValues) => void;

/**
 * One declared argument. Immutable input to the engine; build these with
 * the helpers in `definitions.ts`.
 */
export interface ArgumentDefinition {
  readonly key: string;
  readonly kind: ArgumentKind;
  readonly names: readonly Name[];
  readonly arity: Arity;
  readonly repeating: boolean;
  readonly optional: boolean;
  readonly visibility: Visibility;
  readonly strategy: ParsingStrategy;
  /** Placeholder shown in messages, e.g. `format` in `--format <format>`. */
  readonly valueName?: string;
  /** String form of the default, when one exists. */
  readonly defaultDescription?: string;
  /** Accepted literals, when the value set is enumerable. */
  readonly allowedValues?: readonly string[];
  /** True for one half of an inverted pair or one case of a flag group. */
  readonly composite: boolean;
  readonly update: ArgumentUpdate;
  readonly initial: InitialValue;
}

/** Signature of a caller-supplied value transform. `undefined` rejects. */
export type ValueParser<T> = (raw: string) => T | undefined;
