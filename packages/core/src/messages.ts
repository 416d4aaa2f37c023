// ============================================================================
// @argloom/core — Diagnostic Messages
// ============================================================================
//
// Turns parse error details into the one-line messages users see, and picks
// "Did you mean" suggestions for unknown option names.
// ============================================================================

import { editDistance } from './edit_distance.js';
import type { ParseErrorDetail } from './errors.js';
import type { InputOrigin } from './origin.js';
import { preferredName, synopsis } from './names.js';
import type { ArgumentDefinition, Name } from './types.js';

/** Suggestions must be strictly closer than this many edits. */
export const SIMILARITY_FLOOR = 4;

// ---------------------------------------------------------------------------
// Value names & synopses
// ---------------------------------------------------------------------------

/** `outputFile` → `output-file` */
export function kebabCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1-$2')
    .replace(/_/g, '-')
    .toLowerCase();
}

/**
 * Placeholder for a definition's value: the declared value name, else the
 * preferred name without dashes, else the key in kebab case.
 */
export function valueNameOf(definition: ArgumentDefinition): string {
  if (definition.valueName) return definition.valueName;
  const name = preferredName(definition.names);
  if (name) return name.value;
  return definition.key.length > 0 ? kebabCase(definition.key) : 'value';
}

/**
 * `--count <count>`, `--verbose`, `<file>`; repeating arguments get a
 * trailing ` ...`. Hidden and private definitions have no synopsis.
 */
export function definitionSynopsis(definition: ArgumentDefinition): string | undefined {
  if (definition.visibility !== 'default') return undefined;

  let base: string | undefined;
  if (definition.kind === 'positional') {
    base = `<${valueNameOf(definition)}>`;
  } else {
    const name = preferredName(definition.names);
    if (!name) return undefined;
    base =
      definition.update.arity === 'unary'
        ? `${synopsis(name)} <${valueNameOf(definition)}>`
        : synopsis(name);
  }
  return definition.repeating ? `${base} ...` : base;
}

// ---------------------------------------------------------------------------
// Suggestions
// ---------------------------------------------------------------------------

/**
 * Closest non-short, non-private name to `name`, if any is within the floor.
 * Unknown short names never get a suggestion.
 */
export function suggestName(
  name: Name,
  definitions: readonly ArgumentDefinition[],
  floor: number = SIMILARITY_FLOOR,
): Name | undefined {
  if (name.kind === 'short') return undefined;
  const typed = synopsis(name);

  let best: { name: Name; distance: number } | undefined;
  for (const definition of definitions) {
    if (definition.visibility === 'private') continue;
    for (const candidate of definition.names) {
      if (candidate.kind === 'short') continue;
      const distance = editDistance(synopsis(candidate), typed);
      // The typed name itself is no suggestion.
      if (distance === 0 || distance >= floor) continue;
      if (!best || distance < best.distance) {
        best = { name: candidate, distance };
      }
    }
  }
  return best?.name;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** `flag '--list'`, or `flag 'c' in '-bc'` for a cluster member. */
function describeFlagOrigin(origin: InputOrigin, originalInput: readonly string[]): string {
  const first = origin.elements[0];
  if (!first) return `position ${origin.toString()}`;
  const raw = originalInput[first.input] ?? '';
  if (first.sub === 'complete') return `flag '${raw}'`;
  const char = Array.from(raw)[first.sub + 1] ?? '';
  return `flag '${char}' in '${raw}'`;
}

function quotedList(items: readonly string[]): string {
  return items.map((i) => `'${i}'`).join(', ');
}

export function describeParseError(detail: ParseErrorDetail, originalInput: readonly string[]): string {
  switch (detail.kind) {
    case 'unknownOption':
      return detail.suggestion
        ? `Unknown option '${synopsis(detail.name)}'. Did you mean '${synopsis(detail.suggestion)}'?`
        : `Unknown option '${synopsis(detail.name)}'`;

    case 'missingValue':
      return detail.valueName
        ? `Missing value for '${synopsis(detail.name)} <${detail.valueName}>'`
        : `Missing value for '${synopsis(detail.name)}'`;

    case 'missingArgument': {
      const possibilities = detail.definitions
        .map(definitionSynopsis)
        .filter((s): s is string => s !== undefined);
      if (possibilities.length === 0) return 'Missing expected argument';
      if (possibilities.length === 1) return `Missing expected argument '${possibilities[0]}'`;
      return `Missing one of: ${quotedList(possibilities)}`;
    }

    case 'unexpectedValues': {
      const texts = detail.values.map((v) => v.text);
      if (texts.length === 1) return `Unexpected argument '${texts[0]}'`;
      return `${texts.length} unexpected arguments: ${quotedList(texts)}`;
    }

    case 'unexpectedValueForOption':
      return `The option '${synopsis(detail.name)}' does not take any value, but '${detail.value}' was specified.`;

    case 'duplicateExclusiveValues':
      return `Value to be set with ${describeFlagOrigin(detail.duplicate, originalInput)} had already been set with ${describeFlagOrigin(detail.previous, originalInput)}`;

    case 'invalidValue': {
      const valueName = valueNameOf(detail.definition);
      const target = detail.name ? `${synopsis(detail.name)} <${valueName}>` : `<${valueName}>`;
      let message = `The value '${detail.value}' is invalid for '${target}'`;
      const allowed = detail.definition.allowedValues;
      if (allowed && allowed.length > 0) {
        message += `. Please provide one of ${quotedList(allowed)}.`;
      } else if (detail.reason) {
        message += `: ${detail.reason}`;
      }
      return message;
    }

    case 'invalidState':
      return `Internal error: ${detail.reason}`;
  }
}
