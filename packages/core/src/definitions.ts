// ============================================================================
// @argloom/core — Argument Declarations
// ============================================================================
//
// Builders for the ArgumentDefinitions a command declares. Each builder closes
// over the key it writes, so the matcher only ever calls `update`/`initial`.
//
//   const args = [
//     option('format', { allowedValues: ['json', 'yaml'] }),
//     flag('verbose', { names: ['-v', '--verbose'] }),
//     ...invertedFlag('color', { default: true }),
//     positional('file'),
//   ];
// ============================================================================

import type { BoundValues } from './bound_values.js';
import { ArgumentParseError } from './errors.js';
import { kebabCase } from './messages.js';
import { long, parseName } from './names.js';
import type { InputOrigin } from './origin.js';
import type {
  ArgumentDefinition,
  FlagExclusivity,
  Name,
  ParsingStrategy,
  ValueParser,
  Visibility,
} from './types.js';

/** A name as typed (`'--name'`, `'-n'`, `'-name'`) or a built `Name`. */
export type NameSpec = string | Name;

/** A builder result: one definition, or several sharing a key. */
export type ArgumentInput = ArgumentDefinition | readonly ArgumentDefinition[];

interface CommonConfig {
  visibility?: Visibility;
  valueName?: string;
}

export interface OptionConfig<T> extends CommonConfig {
  /** Defaults to `--<key in kebab case>`. */
  names?: readonly NameSpec[];
  parse?: ValueParser<T>;
  default?: T;
  /** No value and no default is fine. */
  optional?: boolean;
  strategy?: ParsingStrategy;
  allowedValues?: readonly string[];
}

export interface ArrayOptionConfig<T> extends Omit<OptionConfig<T>, 'default'> {
  default?: readonly T[];
}

export interface PositionalConfig<T> extends CommonConfig {
  parse?: ValueParser<T>;
  default?: T;
  optional?: boolean;
  allowedValues?: readonly string[];
}

export interface PositionalArrayConfig<T> extends Omit<PositionalConfig<T>, 'default'> {
  default?: readonly T[];
  /**
   * Capture every element from the first positional input on, including
   * ones that look like options.
   */
  captureAll?: boolean;
}

export interface FlagConfig {
  names?: readonly NameSpec[];
  default?: boolean;
  visibility?: Visibility;
}

export type Inversion = 'prefixedNo' | 'prefixedEnableDisable';

export interface InvertedFlagConfig {
  inversion?: Inversion;
  /** Base long name; defaults to the key in kebab case. */
  name?: string;
  default?: boolean;
  exclusivity?: FlagExclusivity;
  visibility?: Visibility;
}

export interface FlagCase<T extends string> {
  value: T;
  names?: readonly NameSpec[];
  visibility?: Visibility;
}

export interface FlagGroupConfig<T extends string> {
  default?: T;
  optional?: boolean;
  exclusivity?: FlagExclusivity;
  visibility?: Visibility;
}

export interface CounterConfig {
  names?: readonly NameSpec[];
  visibility?: Visibility;
}

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

const INTEGER = /^[+-]?\d+$/;
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const parsers = {
  string: (raw: string): string => raw,
  integer: (raw: string): number | undefined => (INTEGER.test(raw) ? Number.parseInt(raw, 10) : undefined),
  number: (raw: string): number | undefined => (NUMBER.test(raw) ? Number(raw) : undefined),
  boolean: (raw: string): boolean | undefined => {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    return undefined;
  },
} as const;

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function resolveNames(key: string, names: readonly NameSpec[] | undefined): Name[] {
  if (!names || names.length === 0) return [long(kebabCase(key))];
  return names.map((n) => (typeof n === 'string' ? parseName(n) : n));
}

function valueParserFor<T>(
  parse: ValueParser<T> | undefined,
  allowedValues: readonly string[] | undefined,
): (raw: string) => { ok: true; value: unknown } | { ok: false; reason?: string } {
  return (raw) => {
    if (allowedValues && !allowedValues.includes(raw)) return { ok: false };
    if (!parse) return { ok: true, value: raw };
    try {
      const value = parse(raw);
      return value === undefined ? { ok: false } : { ok: true, value };
    } catch (e) {
      return { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
  };
}

function describeDefault(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value.length > 0 ? value.map(String).join(' ') : undefined;
  return String(value);
}

/**
 * Set a flag's key, honouring exclusivity once the key was already set from
 * the command line during this parse.
 */
export function updateFlag(
  key: string,
  value: unknown,
  origin: InputOrigin,
  values: BoundValues,
  exclusivity: FlagExclusivity,
): void {
  const previous = values.get(key);
  if (!previous || !previous.origin.containsAnyArguments) {
    values.set(key, value, origin);
    return;
  }

  switch (exclusivity) {
    case 'exclusive':
      if (previous.value !== value) {
        throw new ArgumentParseError(
          { kind: 'duplicateExclusiveValues', previous: previous.origin, duplicate: origin },
          values.originalInput,
        );
      }
      values.set(key, value, origin);
      return;
    case 'chooseFirst':
      values.update(key, origin, value, (current) => current);
      return;
    case 'chooseLast':
      values.set(key, value, origin);
      return;
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * A named argument taking one value: `--format json`, `--format=json`.
 * Repeats overwrite; the last occurrence wins.
 */
export function option<T = string>(key: string, config: OptionConfig<T> = {}): ArgumentDefinition {
  const parseValue = valueParserFor(config.parse, config.allowedValues);
  const hasDefault = config.default !== undefined;

  const definition: ArgumentDefinition = {
    key,
    kind: 'option',
    names: resolveNames(key, config.names),
    arity: 'scalar',
    repeating: false,
    optional: hasDefault || config.optional === true,
    visibility: config.visibility ?? 'default',
    strategy: config.strategy ?? 'next',
    valueName: config.valueName,
    defaultDescription: describeDefault(config.default),
    allowedValues: config.allowedValues,
    composite: false,
    update: {
      arity: 'unary',
      apply: (origin, name, raw, values) => {
        const parsed = parseValue(raw);
        if (!parsed.ok) {
          throw new ArgumentParseError(
            { kind: 'invalidValue', definition, name, value: raw, origin, reason: parsed.reason },
            values.originalInput,
          );
        }
        values.set(key, parsed.value, origin);
      },
    },
    initial: (origin, values) => {
      if (hasDefault) values.set(key, config.default, origin);
    },
  };
  return definition;
}

/**
 * A named argument collecting every occurrence: `--tag a --tag b` → `['a', 'b']`.
 * The first value from the command line replaces a declared default.
 */
export function arrayOption<T = string>(key: string, config: ArrayOptionConfig<T> = {}): ArgumentDefinition {
  const parseValue = valueParserFor(config.parse, config.allowedValues);
  const hasDefault = config.default !== undefined;

  const definition: ArgumentDefinition = {
    key,
    kind: 'option',
    names: resolveNames(key, config.names),
    arity: 'array',
    repeating: true,
    optional: hasDefault || config.optional === true,
    visibility: config.visibility ?? 'default',
    strategy: config.strategy ?? 'next',
    valueName: config.valueName,
    defaultDescription: describeDefault(config.default),
    allowedValues: config.allowedValues,
    composite: false,
    update: {
      arity: 'unary',
      apply: (origin, name, raw, values) => {
        const parsed = parseValue(raw);
        if (!parsed.ok) {
          throw new ArgumentParseError(
            { kind: 'invalidValue', definition, name, value: raw, origin, reason: parsed.reason },
            values.originalInput,
          );
        }
        appendValue(key, parsed.value, origin, values);
      },
    },
    initial: (origin, values) => {
      if (hasDefault) values.set(key, [...(config.default ?? [])], origin);
    },
  };
  return definition;
}

function appendValue(key: string, value: unknown, origin: InputOrigin, values: BoundValues): void {
  const fromInput = values.isSetFromInput(key);
  values.update(key, origin, [], (current) => {
    const existing: unknown[] = fromInput && Array.isArray(current) ? current : [];
    return [...existing, value];
  });
}

// ---------------------------------------------------------------------------
// Positionals
// ---------------------------------------------------------------------------

export function positional<T = string>(key: string, config: PositionalConfig<T> = {}): ArgumentDefinition {
  const parseValue = valueParserFor(config.parse, config.allowedValues);
  const hasDefault = config.default !== undefined;

  const definition: ArgumentDefinition = {
    key,
    kind: 'positional',
    names: [],
    arity: 'scalar',
    repeating: false,
    optional: hasDefault || config.optional === true,
    visibility: config.visibility ?? 'default',
    strategy: 'next',
    valueName: config.valueName,
    defaultDescription: describeDefault(config.default),
    allowedValues: config.allowedValues,
    composite: false,
    update: {
      arity: 'unary',
      apply: (origin, name, raw, values) => {
        const parsed = parseValue(raw);
        if (!parsed.ok) {
          throw new ArgumentParseError(
            { kind: 'invalidValue', definition, name, value: raw, origin, reason: parsed.reason },
            values.originalInput,
          );
        }
        values.set(key, parsed.value, origin);
      },
    },
    initial: (origin, values) => {
      if (hasDefault) values.set(key, config.default, origin);
    },
  };
  return definition;
}

/**
 * A positional absorbing every remaining value. Must be the last positional.
 */
export function positionalArray<T = string>(
  key: string,
  config: PositionalArrayConfig<T> = {},
): ArgumentDefinition {
  const parseValue = valueParserFor(config.parse, config.allowedValues);
  const hasDefault = config.default !== undefined;

  const definition: ArgumentDefinition = {
    key,
    kind: 'positional',
    names: [],
    arity: 'array',
    repeating: true,
    optional: hasDefault || config.optional === true,
    visibility: config.visibility ?? 'default',
    strategy: config.captureAll ? 'remaining' : 'next',
    valueName: config.valueName,
    defaultDescription: describeDefault(config.default),
    allowedValues: config.allowedValues,
    composite: false,
    update: {
      arity: 'unary',
      apply: (origin, name, raw, values) => {
        const parsed = parseValue(raw);
        if (!parsed.ok) {
          throw new ArgumentParseError(
            { kind: 'invalidValue', definition, name, value: raw, origin, reason: parsed.reason },
            values.originalInput,
          );
        }
        appendValue(key, parsed.value, origin, values);
      },
    },
    initial: (origin, values) => {
      if (hasDefault) values.set(key, [...(config.default ?? [])], origin);
    },
  };
  return definition;
}

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

/**
 * A boolean set to `true` by its presence. Never required.
 */
export function flag(key: string, config: FlagConfig = {}): ArgumentDefinition {
  const initial = config.default ?? false;
  return {
    key,
    kind: 'flag',
    names: resolveNames(key, config.names),
    arity: 'scalar',
    repeating: false,
    optional: true,
    visibility: config.visibility ?? 'default',
    strategy: 'next',
    defaultDescription: String(initial),
    composite: false,
    update: {
      arity: 'nullary',
      apply: (origin, _name, values) => {
        values.set(key, true, origin);
      },
    },
    initial: (origin, values) => {
      values.set(key, initial, origin);
    },
  };
}

/**
 * `--color` / `--no-color` (or `--enable-color` / `--disable-color`) writing
 * one boolean key. Required when no default is given.
 */
export function invertedFlag(key: string, config: InvertedFlagConfig = {}): ArgumentDefinition[] {
  const base = config.name ?? kebabCase(key);
  const exclusivity = config.exclusivity ?? 'chooseLast';
  const [enableName, disableName] =
    config.inversion === 'prefixedEnableDisable'
      ? [`enable-${base}`, `disable-${base}`]
      : [base, `no-${base}`];
  const hasDefault = config.default !== undefined;

  const half = (value: boolean, name: string): ArgumentDefinition => ({
    key,
    kind: 'flag',
    names: [long(name)],
    arity: 'scalar',
    repeating: false,
    optional: hasDefault,
    visibility: config.visibility ?? 'default',
    strategy: 'next',
    defaultDescription: describeDefault(config.default),
    composite: true,
    update: {
      arity: 'nullary',
      apply: (origin, _name, values) => {
        updateFlag(key, value, origin, values, exclusivity);
      },
    },
    initial: (origin, values) => {
      if (hasDefault) values.set(key, config.default, origin);
    },
  });

  return [half(true, enableName), half(false, disableName)];
}

/**
 * One flag per case, all writing the same key: `--stats | --count | --list`.
 * Exclusive by default.
 */
export function flagGroup<T extends string>(
  key: string,
  cases: readonly (T | FlagCase<T>)[],
  config: FlagGroupConfig<T> = {},
): ArgumentDefinition[] {
  const exclusivity = config.exclusivity ?? 'exclusive';
  const hasDefault = config.default !== undefined;
  const optional = hasDefault || config.optional === true;

  return cases.map((entry): ArgumentDefinition => {
    const flagCase: FlagCase<T> = typeof entry === 'string' ? { value: entry } : entry;
    return {
      key,
      kind: 'flag',
      names: resolveNames(flagCase.value, flagCase.names),
      arity: 'scalar',
      repeating: false,
      optional,
      visibility: flagCase.visibility ?? config.visibility ?? 'default',
      strategy: 'next',
      defaultDescription: config.default,
      composite: true,
      update: {
        arity: 'nullary',
        apply: (origin, _name, values) => {
          updateFlag(key, flagCase.value, origin, values, exclusivity);
        },
      },
      initial: (origin, values) => {
        if (hasDefault) values.set(key, config.default, origin);
      },
    };
  });
}

/**
 * Counts occurrences: `-vvv` → 3.
 */
export function counter(key: string, config: CounterConfig = {}): ArgumentDefinition {
  return {
    key,
    kind: 'flag',
    names: resolveNames(key, config.names),
    arity: 'scalar',
    repeating: true,
    optional: true,
    visibility: config.visibility ?? 'default',
    strategy: 'next',
    defaultDescription: '0',
    composite: false,
    update: {
      arity: 'nullary',
      apply: (origin, _name, values) => {
        values.update(key, origin, 0, (current) => (typeof current === 'number' ? current : 0) + 1);
      },
    },
    initial: (origin, values) => {
      values.set(key, 0, origin);
    },
  };
}

// ---------------------------------------------------------------------------
// Groups
// ---------------------------------------------------------------------------

/**
 * Flatten reusable argument bundles into one list, optionally hiding them.
 */
export function optionGroup(
  members: readonly ArgumentInput[],
  config: { visibility?: Visibility } = {},
): ArgumentDefinition[] {
  const flat = flattenArguments(members);
  const visibility = config.visibility;
  if (!visibility || visibility === 'default') return flat;
  return flat.map((d) => (d.visibility === 'default' ? { ...d, visibility } : d));
}

export function flattenArguments(members: readonly ArgumentInput[]): ArgumentDefinition[] {
  const result: ArgumentDefinition[] = [];
  for (const member of members) {
    if (isDefinitionList(member)) {
      result.push(...member);
    } else {
      result.push(member);
    }
  }
  return result;
}

function isDefinitionList(input: ArgumentInput): input is readonly ArgumentDefinition[] {
  return Array.isArray(input);
}
