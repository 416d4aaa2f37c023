import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import type { ParseOutcome } from '../command_parser.js';
import { defineCommand } from '../command.js';
import { flag, option, positionalArray } from '../definitions.js';
import { indexKey, tokenIndex } from '../origin.js';
import { createParser } from '../parse.js';
import { splitArguments } from '../split_arguments.js';

// ============================================================================
// Property Tests
// ============================================================================

const tool = defineCommand({
  name: 'tool',
  arguments: [
    flag('a', { names: ['-a'] }),
    flag('b', { names: ['-b'] }),
    flag('c', { names: ['-c'] }),
    option('name', { names: ['-n', '--name'], optional: true }),
    positionalArray('rest', { optional: true }),
  ],
});
const parser = createParser(tool);

/** Arguments that exercise clusters, values, negatives and the terminator. */
const argument = fc.oneof(
  fc.constantFrom('-a', '-b', '-c', '-abc', '-ca', '-n', '--name', '--name=x', '-5', '-12', '-1.5', '--', '-', 'x', 'y'),
  fc.string({ maxLength: 6 }),
);
const argv = fc.array(argument, { maxLength: 8 });

function summary(outcome: ParseOutcome): unknown {
  switch (outcome.kind) {
    case 'ok':
      return outcome.values.values().map((v) => [v.key, v.value, v.origin.toString()]);
    case 'parseError':
      return outcome.error.message;
    default:
      return outcome;
  }
}

describe('parsing properties', () => {
  it('is deterministic', () => {
    fc.assert(
      fc.property(argv, (input) => {
        expect(summary(parser.parse(input))).toEqual(summary(parser.parse(input)));
      }),
    );
  });

  it('binds a cluster of declared flags like the separate flags', () => {
    fc.assert(
      fc.property(fc.shuffledSubarray(['a', 'b', 'c'], { minLength: 1 }), (letters) => {
        const clustered = parser.parse([`-${letters.join('')}`]);
        const separate = parser.parse(letters.map((l) => `-${l}`));
        expect(clustered.kind).toBe('ok');
        if (clustered.kind !== 'ok' || separate.kind !== 'ok') return;
        expect(clustered.values.toObject()).toEqual(separate.values.toObject());
      }),
    );
  });

  it('keeps everything after the terminator as values', () => {
    fc.assert(
      fc.property(fc.array(argument, { maxLength: 6 }), fc.array(fc.string({ maxLength: 6 }), { maxLength: 6 }), (before, after) => {
        const head = before.filter((arg) => arg !== '--');
        const stream = splitArguments([...head, '--', ...after]);
        const tail = stream.elements.filter((e) => e.index.input > head.length);
        expect(tail.map((e) => e.token)).toEqual(after.map((value) => ({ kind: 'value', value })));
      }),
    );
  });
});

describe('token stream properties', () => {
  it('never returns a removed index', () => {
    fc.assert(
      fc.property(argv, fc.nat(), (input, pick) => {
        const stream = splitArguments(input);
        const elements = stream.elements;
        if (elements.length === 0) return;
        const { index } = elements[pick % elements.length];

        stream.remove(index);

        expect(stream.entry(index)).toBeUndefined();
        expect(stream.elements.some((e) => indexKey(e.index) === indexKey(index))).toBe(false);
        if (index.sub === 'complete') {
          expect(stream.elements.some((e) => e.index.input === index.input)).toBe(false);
        } else {
          expect(stream.entry(tokenIndex(index.input))).toBeUndefined();
        }
      }),
    );
  });

  it('does not disturb other inputs on removal', () => {
    fc.assert(
      fc.property(argv, fc.nat(), (input, pick) => {
        const stream = splitArguments(input);
        const elements = stream.elements;
        if (elements.length === 0) return;
        const { index } = elements[pick % elements.length];
        const others = elements.filter((e) => e.index.input !== index.input);

        stream.remove(index);

        expect(stream.elements.filter((e) => e.index.input !== index.input)).toEqual(others);
      }),
    );
  });
});
