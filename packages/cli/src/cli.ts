// ============================================================================
// @argloom/cli — Developer CLI
// ============================================================================
// Commands:
//   argloom tokens [--json] -- <argv…>                 → token stream
//   argloom check  <definition.yaml>                   → validate declarations
//   argloom parse  <definition.yaml> [--json] -- <argv…> → bound values
// ============================================================================

import {
  ArgloomError,
  type BoundValues,
  EXIT_RUNTIME_FAILURE,
  EXIT_SUCCESS,
  EXIT_VALIDATION_FAILURE,
  ArgumentsValidationError,
  type CommandNode,
  buildCommandTree,
  counter,
  createParser,
  defineCommand,
  exitCodeFor,
  flag,
  getLogLevel,
  invertedFlag,
  positional,
  positionalArray,
  setLogLevel,
  splitArguments,
} from '@argloom/core';
import { DefinitionFileError, parseDefinition } from './definition_loader.js';
import {
  type Palette,
  createPalette,
  formatIssue,
  formatOutcome,
  formatTokenRow,
  outcomeToJson,
  tokenRow,
} from './render.js';

export const VERSION = '0.1.0';

/** Where the CLI reads and writes. `main.ts` binds this to the process. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  readFile(file: string): Promise<string>;
  /** Whether the terminal takes ANSI colors at all. */
  color: boolean;
}

// ── The CLI's own commands ──────────────────────────────────────────────────

const argvArgument = positionalArray('argv', { optional: true, valueName: 'argument' });
const jsonFlag = flag('json');

const tokensCommand = defineCommand({
  name: 'tokens',
  abstract: 'Show how an argument vector is split into tokens.',
  arguments: [jsonFlag, argvArgument],
});

const checkCommand = defineCommand({
  name: 'check',
  abstract: 'Validate a command definition file.',
  arguments: [positional('definition', { valueName: 'file' })],
});

const parseCommand = defineCommand({
  name: 'parse',
  abstract: 'Parse an argument vector against a command definition file.',
  arguments: [positional('definition', { valueName: 'file' }), jsonFlag, argvArgument],
});

export const argloomCommand = defineCommand({
  name: 'argloom',
  version: VERSION,
  arguments: [counter('verbose', { names: ['-v', '--verbose'] }), invertedFlag('color', { default: true })],
  subcommands: [tokensCommand, checkCommand, parseCommand],
});

function printUsage(io: CliIO, palette: Palette): void {
  io.stdout(`${palette.heading('argloom')} ${VERSION}`);
  io.stdout('');
  io.stdout('Usage:');
  io.stdout('  argloom tokens [--json] -- <argument>...             Show the token stream for argv');
  io.stdout('  argloom check <file>                                 Validate a command definition');
  io.stdout('  argloom parse <file> [--json] -- <argument>...       Parse argv against a definition');
  io.stdout('');
  io.stdout('Options:');
  io.stdout('  -v, --verbose          Debug logging (repeatable)');
  io.stdout('  --color / --no-color   Colored output (default: on for terminals)');
  io.stdout('  -h, --help             Show this help');
  io.stdout('  --version              Show the version');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function stringList(values: BoundValues, key: string): string[] {
  const value = values.get(key)?.value;
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function stringValue(values: BoundValues, key: string): string {
  const value = values.get(key)?.value;
  return typeof value === 'string' ? value : '';
}

function booleanValue(values: BoundValues, key: string): boolean {
  return values.get(key)?.value === true;
}

// ── Commands ────────────────────────────────────────────────────────────────

function tokensCommandRun(values: BoundValues, io: CliIO, palette: Palette): number {
  const rows = splitArguments(stringList(values, 'argv')).elements.map(tokenRow);
  if (booleanValue(values, 'json')) {
    io.stdout(JSON.stringify(rows, null, 2));
  } else {
    for (const row of rows) io.stdout(formatTokenRow(row, palette));
  }
  return EXIT_SUCCESS;
}

async function loadTree(file: string, io: CliIO): Promise<CommandNode> {
  const text = await io.readFile(file);
  return buildCommandTree(parseDefinition(text, file));
}

/** Report a failure to load a definition; returns the exit code. */
function reportLoadFailure(error: unknown, io: CliIO, palette: Palette): number {
  if (error instanceof ArgumentsValidationError) {
    io.stderr(palette.fail('Invalid argument declarations:'));
    for (const issue of error.issues) io.stderr(formatIssue(issue, palette));
    return EXIT_VALIDATION_FAILURE;
  }
  if (error instanceof DefinitionFileError || error instanceof ArgloomError) {
    io.stderr(`${palette.fail('Error:')} ${error.message}`);
    return EXIT_VALIDATION_FAILURE;
  }
  io.stderr(`${palette.fail('Error:')} ${errorMessage(error)}`);
  return EXIT_RUNTIME_FAILURE;
}

async function checkCommandRun(values: BoundValues, io: CliIO, palette: Palette): Promise<number> {
  const file = stringValue(values, 'definition');
  let tree: CommandNode;
  try {
    tree = await loadTree(file, io);
  } catch (error) {
    return reportLoadFailure(error, io, palette);
  }

  const commands = [...tree.walk()];
  const argumentCount = commands.reduce((sum, node) => sum + node.argumentSet.definitions.length, 0);
  io.stdout(`${palette.pass('✓')} ${file}: ${commands.length} commands, ${argumentCount} arguments`);
  return EXIT_SUCCESS;
}

async function parseCommandRun(values: BoundValues, io: CliIO, palette: Palette): Promise<number> {
  const file = stringValue(values, 'definition');
  let tree: CommandNode;
  try {
    tree = await loadTree(file, io);
  } catch (error) {
    return reportLoadFailure(error, io, palette);
  }

  const outcome = createParser(tree).parse(stringList(values, 'argv'));
  const code = exitCodeFor(outcome);
  if (booleanValue(values, 'json')) {
    io.stdout(JSON.stringify(outcomeToJson(outcome), null, 2));
  } else {
    for (const line of formatOutcome(outcome, palette)) {
      if (code === EXIT_SUCCESS) io.stdout(line);
      else io.stderr(line);
    }
  }
  return code;
}

// ── Entry ───────────────────────────────────────────────────────────────────

/**
 * Run the CLI against `argv` (without the program name) and return the exit
 * code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const outcome = createParser(argloomCommand).parse(argv);

  switch (outcome.kind) {
    case 'helpRequested':
    case 'completionRequested':
      printUsage(io, createPalette(io.color));
      return EXIT_SUCCESS;
    case 'versionRequested':
      io.stdout(outcome.version);
      return EXIT_SUCCESS;
    case 'parseError':
      io.stderr(`Error: ${outcome.error.message}`);
      return EXIT_VALIDATION_FAILURE;
    case 'ok':
      break;
  }

  const root = outcome.chain[0]?.values ?? outcome.values;
  const palette = createPalette(io.color && booleanValue(root, 'color'));
  const verbose = root.get('verbose')?.value;
  const previousLevel = getLogLevel();
  if (typeof verbose === 'number' && verbose > 0) setLogLevel('debug');

  try {
    const command = outcome.path[1];
    switch (command) {
      case 'tokens':
        return tokensCommandRun(outcome.values, io, palette);
      case 'check':
        return await checkCommandRun(outcome.values, io, palette);
      case 'parse':
        return await parseCommandRun(outcome.values, io, palette);
      default:
        printUsage(io, palette);
        return EXIT_SUCCESS;
    }
  } finally {
    setLogLevel(previousLevel);
  }
}
