// ============================================================================
// @argloom/cli — Definition Loader
// ============================================================================
//
// Reads a command description from YAML or JSON and turns it into the
// CommandDefinition the core parser takes:
//
//   name: deploy
//   version: 1.4.0
//   arguments:
//     - { kind: option, key: region, names: [-r, --region], default: eu-west-1 }
//     - { kind: invertedFlag, key: dryRun, default: false }
//     - { kind: positional, key: target }
//   subcommands:
//     - name: status
// ============================================================================

import path from 'node:path';
import {
  type ArgumentInput,
  type CommandDefinition,
  type ValueParser,
  arrayOption,
  counter,
  defineCommand,
  flag,
  flagGroup,
  invertedFlag,
  nameSpelling,
  option,
  parsers,
  positional,
  positionalArray,
} from '@argloom/core';
import yaml from 'js-yaml';
import { z } from 'zod';

const visibility = z.enum(['default', 'hidden', 'private']);
const strategy = z.enum(['next', 'scanningForValue', 'unconditional', 'upToNextOption', 'remaining']);
const exclusivity = z.enum(['exclusive', 'chooseFirst', 'chooseLast']);
const valueType = z.enum(['string', 'integer', 'number', 'boolean']);
const scalar = z.union([z.string(), z.number(), z.boolean()]);
const names = z.array(nameSpelling).min(1);

const optionSchema = z.object({
  kind: z.literal('option'),
  key: z.string().min(1),
  names: names.optional(),
  type: valueType.default('string'),
  default: scalar.optional(),
  optional: z.boolean().optional(),
  strategy: strategy.optional(),
  allowedValues: z.array(z.string()).optional(),
  valueName: z.string().optional(),
  visibility: visibility.optional(),
});

const arrayOptionSchema = optionSchema.extend({
  kind: z.literal('arrayOption'),
  default: z.array(scalar).optional(),
});

const positionalSchema = z.object({
  kind: z.literal('positional'),
  key: z.string().min(1),
  type: valueType.default('string'),
  default: scalar.optional(),
  optional: z.boolean().optional(),
  allowedValues: z.array(z.string()).optional(),
  valueName: z.string().optional(),
  visibility: visibility.optional(),
});

const positionalArraySchema = positionalSchema.extend({
  kind: z.literal('positionalArray'),
  default: z.array(scalar).optional(),
  captureAll: z.boolean().optional(),
});

const flagSchema = z.object({
  kind: z.literal('flag'),
  key: z.string().min(1),
  names: names.optional(),
  default: z.boolean().optional(),
  visibility: visibility.optional(),
});

const invertedFlagSchema = z.object({
  kind: z.literal('invertedFlag'),
  key: z.string().min(1),
  name: z.string().min(1).optional(),
  inversion: z.enum(['prefixedNo', 'prefixedEnableDisable']).optional(),
  default: z.boolean().optional(),
  exclusivity: exclusivity.optional(),
  visibility: visibility.optional(),
});

const flagGroupSchema = z.object({
  kind: z.literal('flagGroup'),
  key: z.string().min(1),
  cases: z
    .array(z.union([z.string().min(1), z.object({ value: z.string().min(1), names: names.optional() })]))
    .min(1),
  default: z.string().optional(),
  optional: z.boolean().optional(),
  exclusivity: exclusivity.optional(),
  visibility: visibility.optional(),
});

const counterSchema = z.object({
  kind: z.literal('counter'),
  key: z.string().min(1),
  names: names.optional(),
  visibility: visibility.optional(),
});

const argumentSchema = z.discriminatedUnion('kind', [
  optionSchema,
  arrayOptionSchema,
  positionalSchema,
  positionalArraySchema,
  flagSchema,
  invertedFlagSchema,
  flagGroupSchema,
  counterSchema,
]);

export type ArgumentSpec = z.infer<typeof argumentSchema>;

export interface CommandSpec {
  name: string;
  aliases?: string[];
  abstract?: string;
  version?: string;
  defaultSubcommand?: string;
  keys?: string[];
  arguments?: ArgumentSpec[];
  subcommands?: CommandSpec[];
}

export const commandSchema: z.ZodType<CommandSpec, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).optional(),
      abstract: z.string().optional(),
      version: z.string().optional(),
      defaultSubcommand: z.string().optional(),
      keys: z.array(z.string()).optional(),
      arguments: z.array(argumentSchema).optional(),
      subcommands: z.array(commandSchema).optional(),
    })
    .strict(),
);

/**
 * Thrown when a definition file can't be read as a command description.
 */
export class DefinitionFileError extends Error {
  public readonly file: string;
  public readonly issues: readonly string[];

  constructor(file: string, issues: readonly string[]) {
    super(`Invalid definition file ${file}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'DefinitionFileError';
    this.file = file;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

type ValueType = z.infer<typeof valueType>;

function parserFor(type: ValueType): ValueParser<string | number | boolean> {
  return parsers[type];
}

function toArgument(spec: ArgumentSpec): ArgumentInput {
  switch (spec.kind) {
    case 'option':
      return option(spec.key, {
        names: spec.names,
        parse: parserFor(spec.type),
        default: spec.default,
        optional: spec.optional,
        strategy: spec.strategy,
        allowedValues: spec.allowedValues,
        valueName: spec.valueName,
        visibility: spec.visibility,
      });
    case 'arrayOption':
      return arrayOption(spec.key, {
        names: spec.names,
        parse: parserFor(spec.type),
        default: spec.default,
        optional: spec.optional,
        strategy: spec.strategy,
        allowedValues: spec.allowedValues,
        valueName: spec.valueName,
        visibility: spec.visibility,
      });
    case 'positional':
      return positional(spec.key, {
        parse: parserFor(spec.type),
        default: spec.default,
        optional: spec.optional,
        allowedValues: spec.allowedValues,
        valueName: spec.valueName,
        visibility: spec.visibility,
      });
    case 'positionalArray':
      return positionalArray(spec.key, {
        parse: parserFor(spec.type),
        default: spec.default,
        optional: spec.optional,
        allowedValues: spec.allowedValues,
        valueName: spec.valueName,
        visibility: spec.visibility,
        captureAll: spec.captureAll,
      });
    case 'flag':
      return flag(spec.key, { names: spec.names, default: spec.default, visibility: spec.visibility });
    case 'invertedFlag':
      return invertedFlag(spec.key, {
        name: spec.name,
        inversion: spec.inversion,
        default: spec.default,
        exclusivity: spec.exclusivity,
        visibility: spec.visibility,
      });
    case 'flagGroup':
      return flagGroup(spec.key, spec.cases, {
        default: spec.default,
        optional: spec.optional,
        exclusivity: spec.exclusivity,
        visibility: spec.visibility,
      });
    case 'counter':
      return counter(spec.key, { names: spec.names, visibility: spec.visibility });
  }
}

/** Turn a validated description into a CommandDefinition tree. */
export function toCommandDefinition(spec: CommandSpec): CommandDefinition {
  return defineCommand({
    name: spec.name,
    aliases: spec.aliases,
    abstract: spec.abstract,
    version: spec.version,
    defaultSubcommand: spec.defaultSubcommand,
    keys: spec.keys,
    arguments: (spec.arguments ?? []).map(toArgument),
    subcommands: (spec.subcommands ?? []).map(toCommandDefinition),
  });
}

/**
 * Parse definition text. `.json` files are read as JSON, everything else as
 * YAML (which also accepts JSON).
 */
export function parseDefinition(text: string, file: string): CommandDefinition {
  let raw: unknown;
  try {
    raw = path.extname(file).toLowerCase() === '.json' ? JSON.parse(text) : yaml.load(text);
  } catch (e) {
    throw new DefinitionFileError(file, [e instanceof Error ? e.message : String(e)]);
  }

  const result = commandSchema.safeParse(raw);
  if (!result.success) {
    throw new DefinitionFileError(
      file,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return toCommandDefinition(result.data);
}
