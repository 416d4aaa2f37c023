import { describe, expect, it } from 'vitest';
import { long } from '../names.js';
import { InputOrigin, tokenIndex } from '../origin.js';
import { classifyArgument, splitArguments } from '../split_arguments.js';

describe('classifyArgument', () => {
  it('reads long options with and without attached values', () => {
    expect(classifyArgument('--foo', 0)).toEqual([
      { index: tokenIndex(0), token: { kind: 'option', option: { kind: 'name', name: { kind: 'long', value: 'foo' } } } },
    ]);
    expect(classifyArgument('--foo=bar', 3)).toEqual([
      {
        index: tokenIndex(3),
        token: { kind: 'option', option: { kind: 'nameWithValue', name: { kind: 'long', value: 'foo' }, value: 'bar' } },
      },
    ]);
  });

  it('treats a lone dash, plain words and `--=x` as values', () => {
    expect(classifyArgument('-', 0)[0].token).toEqual({ kind: 'value', value: '-' });
    expect(classifyArgument('plain', 0)[0].token).toEqual({ kind: 'value', value: 'plain' });
    expect(classifyArgument('--=x', 0)[0].token).toEqual({ kind: 'value', value: '--=x' });
  });

  it('reads the terminator', () => {
    expect(classifyArgument('--', 1)).toEqual([{ index: tokenIndex(1), token: { kind: 'terminator' } }]);
  });

  it('reads single-dash names with attached values', () => {
    expect(classifyArgument('-f=v', 0)[0].token).toEqual({
      kind: 'option',
      option: { kind: 'nameWithValue', name: { kind: 'short', value: 'f' }, value: 'v' },
    });
    expect(classifyArgument('-fo=v', 0)[0].token).toEqual({
      kind: 'option',
      option: { kind: 'nameWithValue', name: { kind: 'longWithSingleDash', value: 'fo' }, value: 'v' },
    });
  });

  it('splits a cluster into a complete token and one sub token per character', () => {
    const entries = classifyArgument('-abc', 2);
    expect(entries.map((e) => e.index)).toEqual([
      tokenIndex(2),
      tokenIndex(2, 0),
      tokenIndex(2, 1),
      tokenIndex(2, 2),
    ]);
    expect(entries[0].token).toEqual({
      kind: 'option',
      option: { kind: 'name', name: { kind: 'longWithSingleDash', value: 'abc' } },
    });
    expect(entries[3].token).toEqual({
      kind: 'option',
      option: { kind: 'name', name: { kind: 'short', value: 'c' } },
    });
  });

  it('marks numbers as possible negatives', () => {
    expect(classifyArgument('-5', 0)).toEqual([
      {
        index: tokenIndex(0),
        token: { kind: 'possibleNegative', raw: '-5', option: { kind: 'name', name: { kind: 'short', value: '5' } } },
      },
    ]);

    const digits = classifyArgument('-12', 0);
    expect(digits).toHaveLength(3);
    expect(digits[0].token.kind).toBe('possibleNegative');
    expect(digits[1].token).toEqual({
      kind: 'option',
      option: { kind: 'name', name: { kind: 'short', value: '1' } },
    });
  });

  it('gives decimals no short-flag reading', () => {
    expect(classifyArgument('-1.5', 0)).toHaveLength(1);
    expect(classifyArgument('-.5', 0)).toHaveLength(1);
    expect(classifyArgument('-.5', 0)[0].token.kind).toBe('possibleNegative');
  });
});

describe('splitArguments', () => {
  it('never reinterprets input after the terminator', () => {
    const stream = splitArguments(['--foo', '--', '--bar']);
    expect(stream.elements.map((e) => e.token)).toEqual([
      { kind: 'option', option: { kind: 'name', name: { kind: 'long', value: 'foo' } } },
      { kind: 'terminator' },
      { kind: 'value', value: '--bar' },
    ]);
    expect(stream.toString()).toBe("[0] --foo [1] -- [2] '--bar'");
  });

  it('keeps a second `--` after the terminator as a value', () => {
    const stream = splitArguments(['--', '--']);
    expect(stream.elements.map((e) => e.token.kind)).toEqual(['terminator', 'value']);
  });

  it('keeps the original input', () => {
    const stream = splitArguments(['-ab', 'x']);
    expect(stream.originalInput).toEqual(['-ab', 'x']);
    expect(stream.count).toBe(4);
  });
});

describe('TokenStream', () => {
  it('removes a whole cluster through its complete index', () => {
    const stream = splitArguments(['-abc', 'x']);
    stream.remove(tokenIndex(0));
    expect(stream.elements.map((e) => e.index)).toEqual([tokenIndex(1)]);
    expect(stream.entry(tokenIndex(0, 1))).toBeUndefined();
  });

  it('commits a cluster when one of its sub tokens is removed', () => {
    const stream = splitArguments(['-abc', 'x']);
    stream.remove(tokenIndex(0, 1));
    expect(stream.elements.map((e) => e.index)).toEqual([tokenIndex(0, 0), tokenIndex(0, 2), tokenIndex(1)]);
    expect(stream.coalescedExtraElements()).toEqual([
      { index: tokenIndex(0, 0), text: '-a' },
      { index: tokenIndex(0, 2), text: '-c' },
      { index: tokenIndex(1), text: 'x' },
    ]);
  });

  it('removes every index of an origin', () => {
    const stream = splitArguments(['a', 'b', 'c']);
    stream.removeAll(InputOrigin.of(tokenIndex(0), tokenIndex(2)));
    expect(stream.elements.map((e) => e.index)).toEqual([tokenIndex(1)]);
  });

  it('clones independently', () => {
    const stream = splitArguments(['a', 'b']);
    const copy = stream.clone();
    copy.remove(tokenIndex(0));
    expect(copy.count).toBe(1);
    expect(stream.count).toBe(2);
  });

  it('pops the value that follows each packed option', () => {
    const stream = splitArguments(['-fn', 'a', 'b']);
    expect(stream.popNextElementIfValue(tokenIndex(0, 0))).toEqual({ index: tokenIndex(1), value: 'a' });
    expect(stream.popNextElementIfValue(tokenIndex(0, 1))).toEqual({ index: tokenIndex(2), value: 'b' });
  });

  it('pops a value only when it comes next', () => {
    expect(splitArguments(['foo', '--b']).popNextElementIfValue()).toEqual({ index: tokenIndex(0), value: 'foo' });
    expect(splitArguments(['--b', 'foo']).popNextElementIfValue()).toBeUndefined();
  });

  it('scans past options for the next value', () => {
    const stream = splitArguments(['--a', '--b', 'x']);
    expect(stream.popNextValue(tokenIndex(0))).toEqual({ index: tokenIndex(2), value: 'x' });
    expect(stream.peekNextValue()).toBeUndefined();
  });

  it('pops any element as a value, using the original text', () => {
    const stream = splitArguments(['--a', '--b=1', 'x']);
    expect(stream.popNextElementAsValue(tokenIndex(0))).toEqual({ index: tokenIndex(1), value: '--b=1' });
    expect(stream.popNextElementAsValue(tokenIndex(0))).toEqual({ index: tokenIndex(2), value: 'x' });
    expect(stream.popNextElementAsValue(tokenIndex(0))).toBeUndefined();
  });

  it('extracts a joined value only at the first sub index', () => {
    const stream = splitArguments(['-Ddebug']);
    expect(stream.extractJoinedElement(tokenIndex(0, 0))).toEqual({ index: tokenIndex(0), value: 'debug' });
    expect(stream.extractJoinedElement(tokenIndex(0, 1))).toBeUndefined();
  });

  it('drops sub readings without touching the complete token', () => {
    const stream = splitArguments(['-12']);
    stream.removeSubElements(0);
    expect(stream.elements.map((e) => e.index)).toEqual([tokenIndex(0)]);
    expect(stream.hasSubElements(0)).toBe(true);
  });

  it('finds option spellings but not values after the terminator', () => {
    expect(splitArguments(['x', '--help']).contains([long('help')])).toBe(true);
    expect(splitArguments(['--', '--help']).contains([long('help')])).toBe(false);
  });

  it('knows whether anything but the terminator is left', () => {
    expect(splitArguments([]).containsNonTerminatorArguments).toBe(false);
    expect(splitArguments(['--']).containsNonTerminatorArguments).toBe(false);
    expect(splitArguments(['a']).containsNonTerminatorArguments).toBe(true);
    expect(splitArguments([]).isEmpty).toBe(true);
  });

  it('describes an empty stream', () => {
    const stream = splitArguments(['a']);
    stream.popNext();
    expect(stream.toString()).toBe('<empty>');
  });
});
