// ============================================================================
// @argloom/core — Top-level Parse API
// ============================================================================

import type { CommandDefinition, CommandNode } from './command.js';
import { buildCommandTree } from './command.js';
import { CommandParser } from './command_parser.js';
import type { ParseOutcome } from './command_parser.js';
import type { ParserOptionsInput } from './config.js';
import { resolveParserOptions } from './config.js';

export const EXIT_SUCCESS = 0;
/** Bad command-line input (the usage error code from sysexits.h). */
export const EXIT_VALIDATION_FAILURE = 64;
export const EXIT_RUNTIME_FAILURE = 1;

/**
 * Build the tree for `root` once and reuse it across parses.
 */
export function createParser(root: CommandDefinition | CommandNode, options?: ParserOptionsInput): CommandParser {
  const resolved = resolveParserOptions(options);
  const tree =
    'argumentSet' in root ? root : buildCommandTree(root, { helpSubcommand: resolved.helpSubcommand });
  return new CommandParser(tree, resolved);
}

/**
 * Parse argv (without the program name) against `root`.
 *
 * Bad user input comes back as a `parseError` outcome; declaration mistakes
 * throw (`ArgumentsValidationError`, `CommandCycleError`, ...).
 *
 * @example
 * ```ts
 * const tool = defineCommand({ name: 'tool', arguments: [flag('verbose')] });
 * const outcome = parse(tool, ['--verbose']);
 * if (outcome.kind === 'ok') outcome.values.get('verbose')?.value; // → true
 * ```
 */
export function parse(
  root: CommandDefinition | CommandNode,
  argv: readonly string[],
  options?: ParserOptionsInput,
): ParseOutcome {
  return createParser(root, options).parse(argv);
}

/** Process exit code for an outcome, or for an error thrown while running. */
export function exitCodeFor(result: ParseOutcome | Error): number {
  if (result instanceof Error) return EXIT_RUNTIME_FAILURE;
  switch (result.kind) {
    case 'ok':
    case 'helpRequested':
    case 'versionRequested':
    case 'completionRequested':
      return EXIT_SUCCESS;
    case 'parseError':
      return EXIT_VALIDATION_FAILURE;
  }
}
