// ============================================================================
// @argloom/core — Parser Options
// ============================================================================

import { z } from 'zod';
import { ParserOptionsError } from './errors.js';
import { SIMILARITY_FLOOR } from './messages.js';
import { parseName } from './names.js';
import type { Name } from './types.js';

export const nameSpelling = z
  .string()
  .regex(/^-{1,2}[^-=\s][^=\s]*$/, 'must be a dash-prefixed name such as "-h" or "--help"');

export const parserOptionsSchema = z
  .object({
    helpNames: z.array(nameSpelling).min(1).default(['-h', '--help']),
    hiddenHelpNames: z.array(nameSpelling).default(['--help-hidden']),
    /** Only active when the root command declares a version. */
    versionNames: z.array(nameSpelling).default(['--version']),
    completionOption: nameSpelling.default('--generate-completion-script'),
    similarityFloor: z.number().int().min(1).max(64).default(SIMILARITY_FLOOR),
    /** Add a `help` subcommand to trees that have subcommands. */
    helpSubcommand: z.boolean().default(true),
  })
  .strict();

export type ParserOptionsInput = z.input<typeof parserOptionsSchema>;

export interface ParserOptions {
  readonly helpNames: readonly Name[];
  readonly hiddenHelpNames: readonly Name[];
  readonly versionNames: readonly Name[];
  readonly completionOption: Name;
  readonly similarityFloor: number;
  readonly helpSubcommand: boolean;
}

/**
 * Validate and normalize parser options. Throws `ParserOptionsError` listing
 * every problem.
 *
 * @example
 * ```ts
 * resolveParserOptions({ helpNames: ['-?', '--help'] }).helpNames
 * // → [{ kind: 'short', value: '?' }, { kind: 'long', value: 'help' }]
 * ```
 */
export function resolveParserOptions(input: ParserOptionsInput = {}): ParserOptions {
  const result = parserOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ParserOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`),
    );
  }
  const options = result.data;
  return {
    helpNames: options.helpNames.map(parseName),
    hiddenHelpNames: options.hiddenHelpNames.map(parseName),
    versionNames: options.versionNames.map(parseName),
    completionOption: parseName(options.completionOption),
    similarityFloor: options.similarityFloor,
    helpSubcommand: options.helpSubcommand,
  };
}

export const DEFAULT_PARSER_OPTIONS: ParserOptions = resolveParserOptions();
