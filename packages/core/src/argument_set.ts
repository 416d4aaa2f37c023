// ============================================================================
// @argloom/core — Argument Set & Matching Engine
// ============================================================================
//
// Matches a command's declared arguments against a token stream, in stream
// order. Named arguments bind first; positionals then take the remaining
// complete values in declaration order.
//
// Unknown names are left in place: a child command may claim them, and the
// command parser reports whatever is still left at the very end.
// ============================================================================

import { BoundValues } from './bound_values.js';
import { ArgumentParseError } from './errors.js';
import { allowsJoined, nameKey } from './names.js';
import { InputOrigin } from './origin.js';
import type { PoppedValue, TokenStream } from './split_arguments.js';
import { isValueLike } from './split_arguments.js';
import { valueNameOf } from './messages.js';
import type { ArgumentDefinition, Name, OptionToken, TokenIndex, UnaryUpdate } from './types.js';

/**
 * Immutable, ordered list of definitions with a name index. When two
 * definitions share a name the first one wins (the validators flag it).
 */
export class ArgumentSet {
  readonly definitions: readonly ArgumentDefinition[];
  private readonly namePositions = new Map<string, number>();

  constructor(definitions: readonly ArgumentDefinition[]) {
    this.definitions = definitions;
    definitions.forEach((definition, position) => {
      for (const name of definition.names) {
        const key = nameKey(name);
        if (!this.namePositions.has(key)) this.namePositions.set(key, position);
      }
    });
  }

  get size(): number {
    return this.definitions.length;
  }

  /** The definition answering to `name`, if any. */
  first(matching: Name): ArgumentDefinition | undefined {
    const position = this.namePositions.get(nameKey(matching));
    return position === undefined ? undefined : this.definitions[position];
  }

  /** All definitions writing `key`, in declaration order. */
  definitionsFor(key: string): ArgumentDefinition[] {
    return this.definitions.filter((d) => d.key === key);
  }

  get positionals(): ArgumentDefinition[] {
    return this.definitions.filter((d) => d.kind === 'positional');
  }

  /** True when a repeating positional swallows everything, options included. */
  get capturesAll(): boolean {
    return this.definitions.some((d) => d.kind === 'positional' && d.repeating && d.strategy === 'remaining');
  }

  /** Default values, all with an empty origin. */
  setInitialValues(values: BoundValues): void {
    for (const definition of this.definitions) {
      definition.initial(InputOrigin.defaultValue(), values);
    }
  }

  /**
   * Match `input` against this set.
   *
   * Works on a copy; the caller removes `values.usedOrigins()` from its own
   * stream once the command is accepted. Throws `ArgumentParseError` for
   * missing or malformed values and exclusive-flag conflicts.
   */
  lenientParse(input: TokenStream): BoundValues {
    const stream = input.clone();
    const values = new BoundValues(input.originalInput);
    const capturesAll = this.capturesAll;
    const allUsed = InputOrigin.defaultValue();

    this.setInitialValues(values);

    for (let next = stream.popNext(); next !== undefined; next = stream.popNext()) {
      const used = InputOrigin.defaultValue();
      const { index, token } = next;

      if (token.kind === 'value') {
        // The first positional value starts the captured input.
        if (capturesAll) break;
        continue;
      }
      if (token.kind === 'terminator') {
        continue;
      }

      let option: OptionToken;
      if (token.kind === 'possibleNegative') {
        const reading = this.resolveNegative(stream, index, token.option, values);
        if (reading === 'value') {
          if (capturesAll) break;
          continue;
        }
        if (reading === 'shortFlags') {
          // The sub tokens follow in the stream and match one by one.
          continue;
        }
        option = token.option;
      } else {
        option = token.option;
      }

      const definition = this.first(option.name);
      if (!definition) {
        // A cluster like `-fi` may still match through its short readings.
        if (capturesAll && !stream.hasSubElements(index.input)) break;
        continue;
      }

      const origin = InputOrigin.of(index);
      if (definition.update.arity === 'nullary') {
        if (option.kind === 'nameWithValue') {
          throw new ArgumentParseError(
            { kind: 'unexpectedValueForOption', name: option.name, origin, value: option.value },
            values.originalInput,
          );
        }
        definition.update.apply(origin, option.name, values);
        used.insert(index);
      } else {
        this.parseValue(definition, option, index, definition.update.apply, stream, values, used);
      }

      stream.removeAll(used);
      allUsed.formUnion(used);
    }

    values.markConsumed(allUsed);
    const unused = input.clone();
    unused.removeAll(allUsed);
    this.parsePositionalValues(unused, values);
    return values;
  }

  /**
   * Required definitions that ended up unbound, grouped by key, in
   * declaration order.
   */
  missingRequired(values: BoundValues): ArgumentDefinition[][] {
    const seen = new Set<string>();
    const missing: ArgumentDefinition[][] = [];
    for (const definition of this.definitions) {
      if (definition.optional || seen.has(definition.key)) continue;
      seen.add(definition.key);
      if (!values.has(definition.key)) {
        missing.push(this.definitionsFor(definition.key));
      }
    }
    return missing;
  }

  /** Throws `missingArgument` for the first required key left unbound. */
  checkRequired(values: BoundValues): void {
    const [first] = this.missingRequired(values);
    if (first) {
      throw new ArgumentParseError({ kind: 'missingArgument', definitions: first }, values.originalInput);
    }
  }

  // -------------------------------------------------------------------------
  // Negative numbers
  // -------------------------------------------------------------------------

  /**
   * Decide how a `-5` / `-12` token reads. Its whole name wins if declared and
   * not yet set; a digit cluster reads as short flags only when every digit
   * names its own unset definition. Anything else is a number.
   */
  private resolveNegative(
    stream: TokenStream,
    index: TokenIndex,
    option: OptionToken,
    values: BoundValues,
  ): 'option' | 'shortFlags' | 'value' {
    const whole = this.first(option.name);
    if (whole && !values.isSetFromInput(whole.key)) {
      return 'option';
    }

    if (stream.hasSubElements(index.input) && option.kind === 'name') {
      const digits = Array.from(option.name.value);
      const keys = new Set<string>();
      const allUnset = digits.every((digit) => {
        const definition = this.first({ kind: 'short', value: digit });
        if (!definition || keys.has(definition.key) || values.isSetFromInput(definition.key)) {
          return false;
        }
        keys.add(definition.key);
        return true;
      });
      if (allUnset) return 'shortFlags';
    }

    stream.removeSubElements(index.input);
    return 'value';
  }

  // -------------------------------------------------------------------------
  // Values for named arguments
  // -------------------------------------------------------------------------

  private parseValue(
    definition: ArgumentDefinition,
    option: OptionToken,
    index: TokenIndex,
    update: UnaryUpdate,
    stream: TokenStream,
    values: BoundValues,
    used: InputOrigin,
  ): void {
    const origin = InputOrigin.of(index);
    used.insert(index);

    const apply = (popped: PoppedValue): void => {
      const origins = origin.inserting(popped.index);
      update(origins, option.name, popped.value, values);
      used.formUnion(origins);
    };

    const attached = option.kind === 'nameWithValue' ? option.value : undefined;
    const joined =
      attached === undefined && allowsJoinedValue(definition) ? stream.extractJoinedElement(index) : undefined;

    if (attached !== undefined) {
      update(origin, option.name, attached, values);
    } else if (joined) {
      apply(joined);
      stream.removeAll(used);
    }
    const satisfied = attached !== undefined || joined !== undefined;

    switch (definition.strategy) {
      case 'next': {
        if (satisfied) return;
        const popped = stream.popNextElementIfValue(index);
        if (!popped) throw missingValue(definition, option.name, origin, values);
        apply(popped);
        return;
      }

      case 'scanningForValue': {
        if (satisfied) return;
        const popped = stream.popNextValue(index);
        if (!popped) throw missingValue(definition, option.name, origin, values);
        apply(popped);
        return;
      }

      case 'unconditional': {
        if (satisfied) return;
        const popped = stream.popNextElementAsValue(index);
        if (!popped) throw missingValue(definition, option.name, origin, values);
        apply(popped);
        return;
      }

      case 'remaining': {
        let collected = satisfied;
        for (let popped = stream.popNextElementAsValue(index); popped; popped = stream.popNextElementAsValue(index)) {
          apply(popped);
          collected = true;
        }
        // A bare `--rest` still binds its default, now owned by the option.
        if (!collected) definition.initial(origin, values);
        return;
      }

      case 'upToNextOption': {
        for (let popped = stream.popNextElementIfValue(); popped; popped = stream.popNextElementIfValue()) {
          apply(popped);
        }
        return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Positionals
  // -------------------------------------------------------------------------

  private parsePositionalValues(unused: TokenStream, values: BoundValues): void {
    const pending = unused.elements.filter((e) => e.index.sub === 'complete');
    let cursor = 0;

    const next = (unconditional: boolean): TokenIndex | undefined => {
      if (!unconditional) {
        while (cursor < pending.length && !isValueLike(pending[cursor].token)) cursor++;
      }
      const entry = pending[cursor];
      if (!entry) return undefined;
      cursor++;
      return entry.index;
    };

    for (const definition of this.positionals) {
      const update = definition.update;
      if (update.arity !== 'unary') continue;
      const unconditional = definition.strategy === 'remaining';

      do {
        const index = next(unconditional);
        if (!index) return;
        update.apply(InputOrigin.of(index), undefined, unused.originalInputAt(index) ?? '', values);
      } while (definition.repeating);
    }
  }
}

function allowsJoinedValue(definition: ArgumentDefinition): boolean {
  return definition.names.some(allowsJoined);
}

function missingValue(
  definition: ArgumentDefinition,
  name: Name,
  origin: InputOrigin,
  values: BoundValues,
): ArgumentParseError {
  return new ArgumentParseError(
    { kind: 'missingValue', name, origin, valueName: valueNameOf(definition) },
    values.originalInput,
  );
}
