// ============================================================================
// @argloom/core — Static Validators
// ============================================================================
//
// Declaration checks run once per command while the tree is built. Each
// validator returns its issues instead of throwing, so one
// ArgumentsValidationError can list everything wrong at once.
// ============================================================================

import type { ValidationIssue } from './errors.js';
import { synopsis } from './names.js';
import type { ArgumentDefinition } from './types.js';

export interface ValidationTarget {
  /** Command name, for messages. */
  readonly command: string;
  readonly definitions: readonly ArgumentDefinition[];
  /** Backing keys the caller decodes into, when it declares them. */
  readonly keys?: readonly string[];
}

export type Validator = (target: ValidationTarget) => ValidationIssue[];

/**
 * No name may be spelled by more than one declared argument. Reports every
 * colliding name with its count.
 */
export const uniqueNames: Validator = ({ command, definitions }) => {
  const counts = new Map<string, number>();
  for (const name of definitions.flatMap((d) => d.names)) {
    const spelled = synopsis(name);
    counts.set(spelled, (counts.get(spelled) ?? 0) + 1);
  }
  return [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([name, count]) => ({
      kind: 'duplicateName',
      severity: 'error',
      command,
      message: `Multiple (${count}) options or flags are named "${name}".`,
    }));
};

/**
 * At most one repeating positional, and nothing positional after it.
 */
export const positionalOrdering: Validator = ({ command, definitions }) => {
  const positionals = definitions.filter((d) => d.kind === 'positional');
  const repeatedAt = positionals.findIndex((d) => d.repeating);
  if (repeatedAt === -1) return [];

  const following = positionals[repeatedAt + 1];
  if (!following) return [];
  const repeated = positionals[repeatedAt];
  return [
    {
      kind: 'misplacedRepeatingPositional',
      severity: 'error',
      command,
      message: `Can't have a positional argument \`${following.key}\` following an array of positional arguments \`${repeated.key}\`.`,
    },
  ];
};

/**
 * When the command lists its backing keys, every argument must have one.
 */
export const keyCoverage: Validator = ({ command, definitions, keys }) => {
  if (!keys) return [];
  const known = new Set(keys);
  const missing = [...new Set(definitions.map((d) => d.key))].filter((k) => !known.has(k));
  if (missing.length === 0) return [];
  const message =
    missing.length === 1
      ? `Argument \`${missing[0]}\` is defined without a corresponding key.`
      : `Arguments ${missing.map((k) => `\`${k}\``).join(', ')} are defined without corresponding keys.`;
  return [{ kind: 'missingCodingKey', severity: 'error', command, message }];
};

/**
 * A plain boolean flag defaulting to `true` can never be turned off.
 */
export const nonsensicalDefaultFlags: Validator = ({ command, definitions }) => {
  const offenders = definitions.filter(
    (d) =>
      d.kind === 'flag' &&
      !d.composite &&
      !d.repeating &&
      d.update.arity === 'nullary' &&
      d.defaultDescription === 'true',
  );
  if (offenders.length === 0) return [];
  const names = offenders.map((d) => (d.names[0] ? synopsis(d.names[0]) : d.key));
  return [
    {
      kind: 'nonsensicalDefaultFlag',
      severity: 'warning',
      command,
      message: `Boolean flags with a default of \`true\` can never be set to \`false\`; give them an inversion or default them to \`false\`. Affected flags: ${names.join(', ')}`,
    },
  ];
};

export const DEFAULT_VALIDATORS: readonly Validator[] = [
  positionalOrdering,
  keyCoverage,
  uniqueNames,
  nonsensicalDefaultFlags,
];

/** Run every validator and collect all issues. */
export function validateArguments(
  target: ValidationTarget,
  validators: readonly Validator[] = DEFAULT_VALIDATORS,
): ValidationIssue[] {
  return validators.flatMap((validate) => validate(target));
}
