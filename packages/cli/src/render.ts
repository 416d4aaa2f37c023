// ============================================================================
// @argloom/cli — Output Rendering
// ============================================================================

import {
  type BoundValues,
  type ParseOutcome,
  type TokenEntry,
  type ValidationIssue,
  describeOptionToken,
  indexKey,
} from '@argloom/core';

// ── Colors ──────────────────────────────────────────────────────────────────

const codes = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export interface Palette {
  pass(text: string): string;
  fail(text: string): string;
  warn(text: string): string;
  info(text: string): string;
  dim(text: string): string;
  heading(text: string): string;
}

export function createPalette(useColor: boolean): Palette {
  const clr = (color: string, text: string): string => (useColor ? `${color}${text}${codes.reset}` : text);
  return {
    pass: (text) => clr(codes.green, text),
    fail: (text) => clr(codes.red, text),
    warn: (text) => clr(codes.yellow, text),
    info: (text) => clr(codes.cyan, text),
    dim: (text) => clr(codes.dim, text),
    heading: (text) => clr(codes.bold, text),
  };
}

// ── Tokens ──────────────────────────────────────────────────────────────────

export interface TokenRow {
  index: string;
  kind: string;
  text: string;
}

export function tokenRow({ index, token }: TokenEntry): TokenRow {
  const at = indexKey(index);
  switch (token.kind) {
    case 'option':
      return { index: at, kind: 'option', text: describeOptionToken(token.option) };
    case 'possibleNegative':
      return { index: at, kind: 'possibleNegative', text: token.raw };
    case 'value':
      return { index: at, kind: 'value', text: token.value };
    case 'terminator':
      return { index: at, kind: 'terminator', text: '--' };
  }
}

/** `0      option            --foo` */
export function formatTokenRow(row: TokenRow, palette: Palette): string {
  return `${palette.dim(row.index.padEnd(7))}${palette.info(row.kind.padEnd(18))}${row.text}`;
}

// ── Bound values ────────────────────────────────────────────────────────────

export interface ValueRow {
  key: string;
  value: unknown;
  origin: string;
}

export function valueRows(values: BoundValues): ValueRow[] {
  return values.values().map((v) => ({ key: v.key, value: v.value, origin: v.origin.toString() }));
}

export function formatValueRow(row: ValueRow, palette: Palette): string {
  return `  ${row.key} = ${JSON.stringify(row.value)} ${palette.dim(`(${row.origin})`)}`;
}

// ── Outcomes ────────────────────────────────────────────────────────────────

/** JSON-friendly view of a parse outcome. */
export function outcomeToJson(outcome: ParseOutcome): Record<string, unknown> {
  switch (outcome.kind) {
    case 'ok':
      return {
        kind: 'ok',
        path: outcome.path,
        commands: outcome.chain.map((c) => ({ command: c.command.name, values: valueRows(c.values) })),
      };
    case 'parseError':
      return {
        kind: 'parseError',
        path: outcome.path,
        error: outcome.error.kind,
        message: outcome.error.message,
      };
    case 'helpRequested':
      return { kind: 'helpRequested', path: outcome.path, hidden: outcome.hidden };
    case 'versionRequested':
      return { kind: 'versionRequested', version: outcome.version };
    case 'completionRequested':
      return { kind: 'completionRequested', path: outcome.path, shell: outcome.shell ?? null };
  }
}

/** Human-readable lines for a parse outcome. */
export function formatOutcome(outcome: ParseOutcome, palette: Palette): string[] {
  switch (outcome.kind) {
    case 'ok': {
      const lines: string[] = [];
      for (const { command, values } of outcome.chain) {
        lines.push(palette.heading(command.path.join(' ')));
        lines.push(...valueRows(values).map((row) => formatValueRow(row, palette)));
      }
      return lines;
    }
    case 'parseError':
      return [`${palette.fail('Error:')} ${outcome.error.message}`];
    case 'helpRequested':
      return [`Help requested for ${outcome.path.join(' ')}${outcome.hidden ? ' (including hidden arguments)' : ''}`];
    case 'versionRequested':
      return [outcome.version];
    case 'completionRequested':
      return [`Completion script requested for ${outcome.shell ?? 'the current shell'}`];
  }
}

// ── Validation issues ───────────────────────────────────────────────────────

export function formatIssue(issue: ValidationIssue, palette: Palette): string {
  const mark = issue.severity === 'warning' ? palette.warn('warning') : palette.fail('error');
  return `  ${mark} [${issue.kind}] ${issue.command}: ${issue.message}`;
}
