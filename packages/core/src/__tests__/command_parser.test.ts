import { describe, expect, it } from 'vitest';
import { buildCommandTree, defineCommand } from '../command.js';
import type { CommandDefinition } from '../command.js';
import { arrayOption, flag, option, parsers, positional, positionalArray } from '../definitions.js';
import { ArgumentsValidationError, CommandCycleError, CommandDefinitionError } from '../errors.js';
import { EXIT_RUNTIME_FAILURE, createParser, exitCodeFor, parse } from '../parse.js';
import { errorMessage, okValues } from './helpers.js';

const build = defineCommand({
  name: 'build',
  aliases: ['b'],
  arguments: [flag('release'), positional('target', { optional: true })],
});

const test = defineCommand({
  name: 'test',
  arguments: [arrayOption('filter', { names: ['-f', '--filter'], optional: true })],
});

const tool = defineCommand({
  name: 'tool',
  version: '1.2.3',
  arguments: [flag('verbose', { names: ['-v', '--verbose'] })],
  subcommands: [build, test],
  defaultSubcommand: 'build',
});

describe('subcommands', () => {
  it('descends by name and binds each level', () => {
    const outcome = parse(tool, ['-v', 'build', '--release', 'app']);
    expect(okValues(outcome)).toEqual({ release: true, target: 'app' });
    if (outcome.kind !== 'ok') return;
    expect(outcome.path).toEqual(['tool', 'build']);
    expect(outcome.chain.map((c) => c.command.name)).toEqual(['tool', 'build']);
    expect(outcome.chain[0].values.toObject()).toEqual({ verbose: true });
  });

  it('descends by alias', () => {
    const outcome = parse(tool, ['b']);
    expect(outcome.kind === 'ok' && outcome.path).toEqual(['tool', 'build']);
  });

  it('falls back to the default subcommand', () => {
    const outcome = parse(tool, []);
    expect(okValues(outcome)).toEqual({ release: false });
    expect(outcome.kind === 'ok' && outcome.path).toEqual(['tool', 'build']);
  });

  it('lets the default subcommand claim options the parent left', () => {
    expect(okValues(parse(tool, ['--release']))).toEqual({ release: true });
  });

  it('collects repeated options in a subcommand', () => {
    expect(okValues(parse(tool, ['test', '-f', 'a', '-f', 'b']))).toEqual({ filter: ['a', 'b'] });
  });

  it('reports leftovers against the deepest command', () => {
    const outcome = parse(tool, ['build', '--relase']);
    expect(errorMessage(outcome)).toBe("Unknown option '--relase'. Did you mean '--release'?");
    if (outcome.kind !== 'parseError') return;
    expect(outcome.path).toEqual(['tool', 'build']);
    expect(outcome.error.commandPath).toEqual(['tool', 'build']);
    expect(outcome.error.kind).toBe('unknownOption');
  });

  it('reports unexpected values', () => {
    expect(errorMessage(parse(tool, ['build', 'app', 'extra']))).toBe("Unexpected argument 'extra'");
  });

  it('reports a missing value with the long value name', () => {
    expect(errorMessage(parse(tool, ['test', '-f']))).toBe("Missing value for '-f <filter>'");
  });
});

describe('terminal requests', () => {
  it('answers --version on the root', () => {
    expect(parse(tool, ['--version'])).toEqual({ kind: 'versionRequested', version: '1.2.3' });
  });

  it('ignores --version without a declared version', () => {
    const plain = defineCommand({ name: 'plain' });
    expect(errorMessage(parse(plain, ['--version']))).toBe("Unknown option '--version'");
  });

  it('answers help for the command it appears under', () => {
    expect(parse(tool, ['build', '--help'])).toEqual({ kind: 'helpRequested', path: ['tool', 'build'], hidden: false });
    expect(parse(tool, ['-h'])).toEqual({ kind: 'helpRequested', path: ['tool'], hidden: false });
    expect(parse(tool, ['--help-hidden'])).toEqual({ kind: 'helpRequested', path: ['tool'], hidden: true });
  });

  it('prefers help over a parse error', () => {
    expect(parse(tool, ['test', '-f', '--help'])).toEqual({
      kind: 'helpRequested',
      path: ['tool', 'test'],
      hidden: false,
    });
  });

  it('never reads help after the terminator', () => {
    const echo = defineCommand({ name: 'echo', arguments: [positionalArray('words')] });
    expect(okValues(parse(echo, ['--', '--help']))).toEqual({ words: ['--help'] });
  });

  it('routes the help subcommand to the named command', () => {
    expect(parse(tool, ['help', 'test'])).toEqual({ kind: 'helpRequested', path: ['tool', 'test'], hidden: false });
    expect(parse(tool, ['help'])).toEqual({ kind: 'helpRequested', path: ['tool'], hidden: false });
  });

  it('answers completion requests with the shell', () => {
    expect(parse(tool, ['--generate-completion-script', 'zsh'])).toEqual({
      kind: 'completionRequested',
      path: ['tool'],
      shell: 'zsh',
    });
    expect(parse(tool, ['build', '--generate-completion-script=fish'])).toEqual({
      kind: 'completionRequested',
      path: ['tool'],
      shell: 'fish',
    });
  });
});

describe('misspelled options', () => {
  const qwz = defineCommand({
    name: 'qwz',
    arguments: [option('name', { optional: true }), option('title', { names: ['-title'], optional: true })],
  });

  it.each([
    { argv: ['--nme'], message: "Unknown option '--nme'. Did you mean '--name'?" },
    { argv: ['-name'], message: "Unknown option '-name'. Did you mean '--name'?" },
    { argv: ['-ttle'], message: "Unknown option '-ttle'. Did you mean '-title'?" },
    { argv: ['--title'], message: "Unknown option '--title'. Did you mean '-title'?" },
    { argv: ['--not-similar'], message: "Unknown option '--not-similar'" },
    { argv: ['-x'], message: "Unknown option '-x'" },
  ])('$argv', ({ argv, message }) => {
    expect(errorMessage(parse(qwz, argv))).toBe(message);
  });

  it('reports the unknown option before a value a positional left over', () => {
    const cmd = defineCommand({
      name: 'say',
      arguments: [option('count', { parse: parsers.integer, optional: true }), positional('phrase')],
    });
    expect(errorMessage(parse(cmd, ['--cont', '5', 'Hello']))).toBe(
      "Unknown option '--cont'. Did you mean '--count'?",
    );
  });

  it('honours the similarity floor option', () => {
    expect(errorMessage(parse(qwz, ['--nme'], { similarityFloor: 1 }))).toBe("Unknown option '--nme'");
  });
});

describe('command tree', () => {
  it('detects cycles', () => {
    const a: CommandDefinition = defineCommand({ name: 'a', subcommands: () => [b] });
    const b: CommandDefinition = defineCommand({ name: 'b', subcommands: () => [a] });
    expect(() => buildCommandTree(a)).toThrow(CommandCycleError);
    expect(() => buildCommandTree(a)).toThrow('Command cycle detected: a → b → a');
  });

  it('allows one definition under two parents', () => {
    const shared = defineCommand({ name: 'status' });
    const root = defineCommand({
      name: 'root',
      subcommands: [defineCommand({ name: 'x', subcommands: [shared] }), defineCommand({ name: 'y', subcommands: [shared] })],
    });
    expect([...buildCommandTree(root).walk()].map((n) => n.path.join(' '))).toEqual([
      'root',
      'root x',
      'root x status',
      'root y',
      'root y status',
      'root help',
    ]);
  });

  it('rejects an unknown default subcommand', () => {
    const broken = defineCommand({ name: 'x', defaultSubcommand: 'nope' });
    expect(() => buildCommandTree(broken)).toThrow(CommandDefinitionError);
    expect(() => buildCommandTree(broken)).toThrow('Default subcommand "nope" is not a subcommand of "x".');
  });

  it('rejects an empty command name', () => {
    expect(() => defineCommand({ name: ' ' })).toThrow(CommandDefinitionError);
  });

  it('throws declaration problems from parse', () => {
    const broken = defineCommand({ name: 'cp', arguments: [positionalArray('files'), positional('dest')] });
    expect(() => parse(broken, [])).toThrow(ArgumentsValidationError);
  });

  it('can skip the help subcommand', () => {
    const git = defineCommand({ name: 'git', subcommands: [defineCommand({ name: 'init' })] });
    expect(errorMessage(parse(git, ['help'], { helpSubcommand: false }))).toBe("Unexpected argument 'help'");
  });

  it('reuses a prepared parser', () => {
    const parser = createParser(tool);
    expect(okValues(parser.parse(['build']))).toEqual(okValues(parser.parse(['build'])));
  });
});

describe('exitCodeFor', () => {
  it('maps outcomes to exit codes', () => {
    expect(exitCodeFor(parse(tool, []))).toBe(0);
    expect(exitCodeFor(parse(tool, ['--help']))).toBe(0);
    expect(exitCodeFor(parse(tool, ['build', 'a', 'b']))).toBe(64);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_RUNTIME_FAILURE);
  });
});
