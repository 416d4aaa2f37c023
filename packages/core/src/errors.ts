// ============================================================================
// @argloom/core — Error Types
// ============================================================================

import { describeParseError } from './messages.js';
import type { InputOrigin } from './origin.js';
import type { ExtraElement } from './split_arguments.js';
import type { ArgumentDefinition, Name } from './types.js';

/**
 * Base error class for all argloom errors.
 */
export class ArgloomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgloomError';
  }
}

// ---------------------------------------------------------------------------
// Parse Errors (bad user input)
// ---------------------------------------------------------------------------

/**
 * What went wrong while matching argv against a command. Each variant carries
 * enough context to render its message without the argument set.
 */
export type ParseErrorDetail =
  | { readonly kind: 'unknownOption'; readonly name: Name; readonly origin: InputOrigin; readonly suggestion?: Name }
  | {
      readonly kind: 'missingValue';
      readonly name: Name;
      readonly origin: InputOrigin;
      readonly valueName?: string;
    }
  | { readonly kind: 'missingArgument'; readonly definitions: readonly ArgumentDefinition[] }
  | { readonly kind: 'unexpectedValues'; readonly values: readonly ExtraElement[] }
  | {
      readonly kind: 'unexpectedValueForOption';
      readonly name: Name;
      readonly origin: InputOrigin;
      readonly value: string;
    }
  | {
      readonly kind: 'duplicateExclusiveValues';
      readonly previous: InputOrigin;
      readonly duplicate: InputOrigin;
    }
  | {
      readonly kind: 'invalidValue';
      readonly definition: ArgumentDefinition;
      readonly name?: Name;
      readonly value: string;
      readonly origin: InputOrigin;
      readonly reason?: string;
    }
  | { readonly kind: 'invalidState'; readonly reason: string };

export type ParseErrorKind = ParseErrorDetail['kind'];

/**
 * Thrown by the matcher and the command parser; returned to callers inside a
 * `parseError` outcome.
 */
export class ArgumentParseError extends ArgloomError {
  public readonly detail: ParseErrorDetail;
  public readonly originalInput: readonly string[];
  /** Command names from the root down to the command that failed. */
  public readonly commandPath: readonly string[];

  constructor(detail: ParseErrorDetail, originalInput: readonly string[], commandPath: readonly string[] = []) {
    super(describeParseError(detail, originalInput));
    this.name = 'ArgumentParseError';
    this.detail = detail;
    this.originalInput = originalInput;
    this.commandPath = commandPath;
  }

  get kind(): ParseErrorKind {
    return this.detail.kind;
  }

  withCommandPath(commandPath: readonly string[]): ArgumentParseError {
    return new ArgumentParseError(this.detail, this.originalInput, commandPath);
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors (programming mistakes)
// ---------------------------------------------------------------------------

export type ValidationIssueKind =
  | 'duplicateName'
  | 'misplacedRepeatingPositional'
  | 'missingCodingKey'
  | 'nonsensicalDefaultFlag';

export interface ValidationIssue {
  readonly kind: ValidationIssueKind;
  readonly severity: 'error' | 'warning';
  /** Name of the command whose arguments failed the check. */
  readonly command: string;
  readonly message: string;
}

/**
 * Every static-validator issue found while building a command tree.
 */
export class ArgumentsValidationError extends ArgloomError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(
      `Invalid argument declarations:\n${issues.map((i) => `  - ${i.command}: ${i.message}`).join('\n')}`,
    );
    this.name = 'ArgumentsValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a command is reachable from itself through its subcommands.
 */
export class CommandCycleError extends ArgloomError {
  public readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super(`Command cycle detected: ${path.join(' → ')}`);
    this.name = 'CommandCycleError';
    this.path = path;
  }
}

/**
 * Thrown when a command declaration is malformed in a way no validator covers
 * (unknown default subcommand, empty name).
 */
export class CommandDefinitionError extends ArgloomError {
  public readonly command: string;

  constructor(command: string, message: string) {
    super(message);
    this.name = 'CommandDefinitionError';
    this.command = command;
  }
}

/**
 * Thrown when parser options fail schema validation.
 */
export class ParserOptionsError extends ArgloomError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid parser options: ${issues.join('; ')}`);
    this.name = 'ParserOptionsError';
    this.issues = issues;
  }
}
