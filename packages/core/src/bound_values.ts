// ============================================================================
// @argloom/core — Bound Values
// ============================================================================
//
// Flat key → value bag produced by matching. Every value keeps the union of
// all origins that ever wrote its key, which is what duplicate detection and
// "already set by" diagnostics read.
// ============================================================================

import { InputOrigin } from './origin.js';

export interface BoundValue {
  readonly key: string;
  readonly value: unknown;
  readonly origin: InputOrigin;
}

export class BoundValues {
  private readonly entries = new Map<string, BoundValue>();
  /** Tokens matched to an argument that wrote no value, like an empty `--rest`. */
  private readonly consumed = InputOrigin.defaultValue();
  /** The argv these values were matched from, for error output. */
  readonly originalInput: readonly string[];

  constructor(originalInput: readonly string[]) {
    this.originalInput = originalInput;
  }

  /** Set `key`, merging previously recorded origins. */
  set(key: string, value: unknown, origin: InputOrigin): void {
    const previous = this.entries.get(key);
    const merged = previous ? origin.union(previous.origin) : origin.union(InputOrigin.defaultValue());
    this.entries.set(key, { key, value, origin: merged });
  }

  /**
   * Transform the current value of `key` (or `initial` when absent) and
   * store the result with `origin` added.
   */
  update<T>(key: string, origin: InputOrigin, initial: T, transform: (current: unknown) => T): void {
    const previous = this.entries.get(key);
    const value = transform(previous ? previous.value : initial);
    const merged = previous ? previous.origin.union(origin) : origin.union(InputOrigin.defaultValue());
    this.entries.set(key, { key, value, origin: merged });
  }

  get(key: string): BoundValue | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** True when `key` was written by at least one command-line token. */
  isSetFromInput(key: string): boolean {
    return this.entries.get(key)?.origin.containsAnyArguments ?? false;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  values(): BoundValue[] {
    return [...this.entries.values()];
  }

  /** Record tokens that were matched without writing any key. */
  markConsumed(origin: InputOrigin): void {
    this.consumed.formUnion(origin);
  }

  /** Union of every origin that came from the command line. */
  usedOrigins(): InputOrigin {
    const result = this.consumed.union(InputOrigin.defaultValue());
    for (const entry of this.entries.values()) {
      result.formUnion(entry.origin);
    }
    return result;
  }

  /** Plain object of key → value, in insertion order. */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of this.entries) {
      result[key] = entry.value;
    }
    return result;
  }
}
