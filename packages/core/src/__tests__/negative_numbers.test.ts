import { describe, expect, it } from 'vitest';
import { defineCommand } from '../command.js';
import { arrayOption, flag, option, parsers, positional, positionalArray } from '../definitions.js';
import { parse } from '../parse.js';
import { errorMessage, okValues } from './helpers.js';

describe('negative numbers', () => {
  it('binds -5 to an integer positional', () => {
    const cmd = defineCommand({ name: 'calc', arguments: [positional('n', { parse: parsers.integer })] });
    expect(okValues(parse(cmd, ['-5']))).toEqual({ n: -5 });
  });

  it('reads a negative number as an option value', () => {
    const cmd = defineCommand({ name: 'calc', arguments: [option('offset', { parse: parsers.number })] });
    expect(okValues(parse(cmd, ['--offset', '-5']))).toEqual({ offset: -5 });
    expect(okValues(parse(cmd, ['--offset', '-1.5']))).toEqual({ offset: -1.5 });
  });

  describe('digit flags', () => {
    const cmd = defineCommand({
      name: 'calc',
      arguments: [
        flag('four', { names: ['-4'] }),
        flag('six', { names: ['-6'] }),
        positionalArray('numbers', { parse: parsers.integer, optional: true }),
      ],
    });

    it('splits a digit cluster into unset flags', () => {
      expect(okValues(parse(cmd, ['-46', '-4', '-6']))).toEqual({ four: true, six: true, numbers: [-4, -6] });
    });

    it('reads a cluster as a number once a digit flag is set', () => {
      expect(okValues(parse(cmd, ['-4', '-6', '-46']))).toEqual({ four: true, six: true, numbers: [-46] });
    });

    it('reads a cluster with an undeclared digit as a number', () => {
      expect(okValues(parse(cmd, ['-45']))).toEqual({ four: false, six: false, numbers: [-45] });
    });
  });

  it('reports leftover numbers as unexpected arguments', () => {
    const cmd = defineCommand({
      name: 'calc',
      arguments: [
        flag('four', { names: ['-4'] }),
        flag('six', { names: ['-6'] }),
        flag('twelve', { names: ['-12'] }),
      ],
    });
    const outcome = parse(cmd, ['-46', '-1', '-35', '-12', '-34', '-4', '-12']);
    expect(errorMessage(outcome)).toBe("5 unexpected arguments: '-1', '-35', '-34', '-4', '-12'");
  });

  describe('options named by digits', () => {
    const scalarOptions = defineCommand({
      name: 'calc',
      arguments: [
        option('one', { names: ['-1'], parse: parsers.integer }),
        option('twelve', { names: ['-12'], parse: parsers.integer }),
      ],
    });

    it('gives an unset option its name and an already-set one a number', () => {
      const outcome = parse(scalarOptions, ['-1', '-12', '-1', '-3', '-12', '-1']);
      expect(errorMessage(outcome)).toBe("2 unexpected arguments: '-1', '-3'");
    });

    it('binds each option once', () => {
      expect(okValues(parse(scalarOptions, ['-1', '-12', '-12', '-1']))).toEqual({ one: -12, twelve: -1 });
    });

    const arrayOptions = defineCommand({
      name: 'calc',
      arguments: [
        arrayOption('one', { names: ['-1'], parse: parsers.integer, strategy: 'upToNextOption' }),
        arrayOption('twelve', { names: ['-12'], parse: parsers.integer, strategy: 'upToNextOption', optional: true }),
        flag('flag'),
      ],
    });

    it('collects negative numbers up to the next option', () => {
      expect(okValues(parse(arrayOptions, ['-1', '-12', '-1', '-3', '-12', '-1']))).toEqual({
        one: [-12, -1, -3, -12, -1],
        flag: false,
      });
    });

    it('stops collecting at a real option', () => {
      expect(okValues(parse(arrayOptions, ['-1', '-12', '-1', '-3', '--flag', '-12', '-1']))).toEqual({
        one: [-12, -1, -3],
        twelve: [-1],
        flag: true,
      });
    });
  });
});
