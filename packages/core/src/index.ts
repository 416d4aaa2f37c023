// ============================================================================
// @argloom/core — Public API
// ============================================================================

// High-level API
export { parse, createParser, exitCodeFor, EXIT_SUCCESS, EXIT_VALIDATION_FAILURE, EXIT_RUNTIME_FAILURE } from './parse.js';
export { CommandParser } from './command_parser.js';
export type { ParseOutcome, ParsedCommand, TerminalOutcome } from './command_parser.js';

// Declarations
export {
  option,
  arrayOption,
  positional,
  positionalArray,
  flag,
  invertedFlag,
  flagGroup,
  counter,
  optionGroup,
  flattenArguments,
  updateFlag,
  parsers,
} from './definitions.js';
export type {
  ArgumentInput,
  NameSpec,
  OptionConfig,
  ArrayOptionConfig,
  PositionalConfig,
  PositionalArrayConfig,
  FlagConfig,
  InvertedFlagConfig,
  Inversion,
  FlagCase,
  FlagGroupConfig,
  CounterConfig,
} from './definitions.js';
export { defineCommand, buildCommandTree, CommandNode } from './command.js';
export type { CommandConfig, CommandDefinition, SubcommandList, BuildTreeOptions } from './command.js';

// Names
export { long, short, longWithSingleDash, parseName, synopsis, nameKey, namesEqual, preferredName } from './names.js';

// Tokenizer
export { splitArguments, classifyArgument, TokenStream, describeOptionToken, isValueLike } from './split_arguments.js';
export type { PoppedValue, ExtraElement } from './split_arguments.js';
export { tokenIndex, compareIndex, indexKey, InputOrigin } from './origin.js';

// Matching
export { ArgumentSet } from './argument_set.js';
export { BoundValues } from './bound_values.js';
export type { BoundValue } from './bound_values.js';

// Validation
export {
  validateArguments,
  uniqueNames,
  positionalOrdering,
  keyCoverage,
  nonsensicalDefaultFlags,
  DEFAULT_VALIDATORS,
} from './validators.js';
export type { Validator, ValidationTarget } from './validators.js';

// Diagnostics
export { describeParseError, suggestName, definitionSynopsis, valueNameOf, SIMILARITY_FLOOR } from './messages.js';
export { editDistance } from './edit_distance.js';

// Errors
export {
  ArgloomError,
  ArgumentParseError,
  ArgumentsValidationError,
  CommandCycleError,
  CommandDefinitionError,
  ParserOptionsError,
} from './errors.js';
export type { ParseErrorDetail, ParseErrorKind, ValidationIssue, ValidationIssueKind } from './errors.js';

// Configuration
export { resolveParserOptions, parserOptionsSchema, nameSpelling, DEFAULT_PARSER_OPTIONS } from './config.js';
export type { ParserOptions, ParserOptionsInput } from './config.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  Name,
  OptionToken,
  Token,
  SubIndex,
  TokenIndex,
  TokenEntry,
  ArgumentKind,
  Arity,
  Visibility,
  ParsingStrategy,
  FlagExclusivity,
  ArgumentDefinition,
  ArgumentUpdate,
  NullaryUpdate,
  UnaryUpdate,
  InitialValue,
  ValueParser,
} from './types.js';
