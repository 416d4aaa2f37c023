import type { ParseOutcome } from '../command_parser.js';

/** Bound values of an `ok` outcome as a plain object. */
export function okValues(outcome: ParseOutcome): Record<string, unknown> {
  if (outcome.kind !== 'ok') {
    const detail = outcome.kind === 'parseError' ? `: ${outcome.error.message}` : '';
    throw new Error(`expected ok, got ${outcome.kind}${detail}`);
  }
  return outcome.values.toObject();
}

/** Message of a `parseError` outcome. */
export function errorMessage(outcome: ParseOutcome): string {
  if (outcome.kind !== 'parseError') {
    throw new Error(`expected parseError, got ${outcome.kind}`);
  }
  return outcome.error.message;
}
