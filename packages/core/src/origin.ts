// ============================================================================
// @argloom/core — Token Indexes & Input Origins
// ============================================================================
//
// A bound value remembers every token that produced it. An origin with no
// indexes is the default value.
// ============================================================================

import type { TokenIndex } from './types.js';

export function tokenIndex(input: number, sub: TokenIndex['sub'] = 'complete'): TokenIndex {
  return { input, sub };
}

/** `complete` sorts before any `sub(n)` at the same input position. */
export function compareIndex(a: TokenIndex, b: TokenIndex): number {
  if (a.input !== b.input) return a.input - b.input;
  if (a.sub === b.sub) return 0;
  if (a.sub === 'complete') return -1;
  if (b.sub === 'complete') return 1;
  return a.sub - b.sub;
}

/** `"3"` for a complete index, `"3.1"` for a sub index. */
export function indexKey(index: TokenIndex): string {
  return index.sub === 'complete' ? `${index.input}` : `${index.input}.${index.sub}`;
}

/**
 * Set of token indexes a value came from.
 */
export class InputOrigin {
  private readonly indexes = new Map<string, TokenIndex>();

  constructor(indexes: Iterable<TokenIndex> = []) {
    for (const index of indexes) {
      this.indexes.set(indexKey(index), index);
    }
  }

  /** The origin of a declared default. */
  static defaultValue(): InputOrigin {
    return new InputOrigin();
  }

  static of(...indexes: TokenIndex[]): InputOrigin {
    return new InputOrigin(indexes);
  }

  get isDefault(): boolean {
    return this.indexes.size === 0;
  }

  /** Does this origin contain anything from the command line? */
  get containsAnyArguments(): boolean {
    return this.indexes.size > 0;
  }

  get size(): number {
    return this.indexes.size;
  }

  /** Indexes in stream order. */
  get elements(): TokenIndex[] {
    return [...this.indexes.values()].sort(compareIndex);
  }

  has(index: TokenIndex): boolean {
    return this.indexes.has(indexKey(index));
  }

  insert(index: TokenIndex): void {
    this.indexes.set(indexKey(index), index);
  }

  inserting(index: TokenIndex): InputOrigin {
    const result = new InputOrigin(this.indexes.values());
    result.insert(index);
    return result;
  }

  formUnion(other: InputOrigin): void {
    for (const index of other.indexes.values()) {
      this.insert(index);
    }
  }

  union(other: InputOrigin): InputOrigin {
    const result = new InputOrigin(this.indexes.values());
    result.formUnion(other);
    return result;
  }

  toString(): string {
    return this.isDefault ? 'default' : this.elements.map(indexKey).join(',');
  }
}
