import { describe, expect, it } from 'vitest';
import { counter, flag, flattenArguments, invertedFlag, positional, positionalArray } from '../definitions.js';
import type { ArgumentInput } from '../definitions.js';
import {
  keyCoverage,
  nonsensicalDefaultFlags,
  positionalOrdering,
  uniqueNames,
  validateArguments,
} from '../validators.js';

function target(args: ArgumentInput[], keys?: string[]) {
  return { command: 'tool', definitions: flattenArguments(args), keys };
}

describe('uniqueNames', () => {
  it('reports each name spelled more than once', () => {
    expect(uniqueNames(target([flag('a', { names: ['-x'] }), flag('b', { names: ['-x'] })]))).toEqual([
      {
        kind: 'duplicateName',
        severity: 'error',
        command: 'tool',
        message: 'Multiple (2) options or flags are named "-x".',
      },
    ]);
  });

  it('passes distinct names', () => {
    expect(uniqueNames(target([flag('a'), flag('b')]))).toEqual([]);
  });
});

describe('positionalOrdering', () => {
  it('names the array and the positional after it', () => {
    const issues = positionalOrdering(target([positionalArray('files'), positional('dest')]));
    expect(issues.map((i) => i.message)).toEqual([
      "Can't have a positional argument `dest` following an array of positional arguments `files`.",
    ]);
  });

  it('flags two arrays when the first is not last', () => {
    const issues = positionalOrdering(target([positionalArray('sources'), positionalArray('targets')]));
    expect(issues[0]?.message).toBe(
      "Can't have a positional argument `targets` following an array of positional arguments `sources`.",
    );
  });

  it('allows a trailing array', () => {
    expect(positionalOrdering(target([positional('dest'), positionalArray('files')]))).toEqual([]);
  });
});

describe('keyCoverage', () => {
  it('is silent without declared keys', () => {
    expect(keyCoverage(target([flag('a')]))).toEqual([]);
  });

  it('lists arguments without a key', () => {
    expect(keyCoverage(target([flag('a'), flag('b')], ['a'])).map((i) => i.message)).toEqual([
      'Argument `b` is defined without a corresponding key.',
    ]);
    expect(keyCoverage(target([flag('a'), flag('b'), flag('c')], ['a'])).map((i) => i.message)).toEqual([
      'Arguments `b`, `c` are defined without corresponding keys.',
    ]);
  });
});

describe('nonsensicalDefaultFlags', () => {
  it('warns about a plain flag defaulting to true', () => {
    expect(nonsensicalDefaultFlags(target([flag('force', { default: true })]))).toEqual([
      {
        kind: 'nonsensicalDefaultFlag',
        severity: 'warning',
        command: 'tool',
        message:
          'Boolean flags with a default of `true` can never be set to `false`; give them an inversion or default them to `false`. Affected flags: --force',
      },
    ]);
  });

  it('accepts inverted flags and counters', () => {
    expect(
      nonsensicalDefaultFlags(target([invertedFlag('color', { default: true }), counter('verbose'), flag('quiet')])),
    ).toEqual([]);
  });
});

describe('validateArguments', () => {
  it('collects issues from every validator', () => {
    const issues = validateArguments(
      target([positionalArray('files'), positional('dest'), flag('a', { names: ['-x'] }), flag('b', { names: ['-x'] })]),
    );
    expect(issues.map((i) => i.kind)).toEqual(['misplacedRepeatingPositional', 'duplicateName']);
  });
});
