// ============================================================================
// @argloom/core — Command Parser
// ============================================================================
//
// Walks the command tree along argv: each command matches its own arguments,
// removes what it used, and hands the rest to the subcommand named next.
// Whatever is left once no further subcommand applies is an error.
// ============================================================================

import type { BoundValues } from './bound_values.js';
import type { CommandNode } from './command.js';
import type { ParserOptions } from './config.js';
import { ArgumentParseError } from './errors.js';
import { logCommandMatched, logTerminalRequest, timer } from './logger.js';
import { suggestName } from './messages.js';
import { nameKey } from './names.js';
import { InputOrigin, tokenIndex } from './origin.js';
import type { TokenStream } from './split_arguments.js';
import { splitArguments } from './split_arguments.js';

/** One command on the matched path, with the values it bound. */
export interface ParsedCommand {
  readonly command: CommandNode;
  readonly values: BoundValues;
}

export type ParseOutcome =
  | {
      readonly kind: 'ok';
      /** The deepest matched command. */
      readonly command: CommandNode;
      readonly path: readonly string[];
      readonly values: BoundValues;
      /** Every matched command from the root down. */
      readonly chain: readonly ParsedCommand[];
    }
  | { readonly kind: 'parseError'; readonly error: ArgumentParseError; readonly path: readonly string[] }
  | { readonly kind: 'helpRequested'; readonly path: readonly string[]; readonly hidden: boolean }
  | { readonly kind: 'versionRequested'; readonly version: string }
  | { readonly kind: 'completionRequested'; readonly path: readonly string[]; readonly shell?: string };

export type TerminalOutcome = Extract<
  ParseOutcome,
  { kind: 'helpRequested' | 'versionRequested' | 'completionRequested' }
>;

/** Unwinds a parse when the user asked for help, version or completion. */
class TerminalRequest extends Error {
  readonly outcome: TerminalOutcome;

  constructor(outcome: TerminalOutcome) {
    super(outcome.kind);
    this.name = 'TerminalRequest';
    this.outcome = outcome;
  }
}

interface ParseState {
  readonly stream: TokenStream;
  node: CommandNode;
  readonly chain: ParsedCommand[];
}

export class CommandParser {
  readonly tree: CommandNode;
  readonly options: ParserOptions;

  constructor(tree: CommandNode, options: ParserOptions) {
    this.tree = tree;
    this.options = options;
  }

  /** Parse argv (without the program name). Never throws for bad input. */
  parse(argv: readonly string[]): ParseOutcome {
    const t = timer('parse');
    const state: ParseState = { stream: splitArguments(argv), node: this.tree, chain: [] };

    try {
      this.checkForCompletionRequest(state.stream);
      this.descendingParse(state);
      const last = this.extractLast(state);
      t.endWith({ command: state.node.path.join(' ') });

      if (state.node.builtinHelp) {
        const names = last.values.get('subcommands')?.value;
        const target = this.tree.descend(Array.isArray(names) ? names.filter(isString) : []);
        return { kind: 'helpRequested', path: target.path, hidden: false };
      }
      return { kind: 'ok', command: state.node, path: state.node.path, values: last.values, chain: state.chain };
    } catch (e) {
      if (e instanceof TerminalRequest) {
        logTerminalRequest(e.outcome.kind, state.node.path);
        return e.outcome;
      }
      if (e instanceof ArgumentParseError) {
        return { kind: 'parseError', error: e.withCommandPath(state.node.path), path: state.node.path };
      }
      throw e;
    }
  }

  private descendingParse(state: ParseState): void {
    for (;;) {
      this.parseCurrent(state);

      const next = this.consumeNextCommand(state);
      if (next) {
        state.node = next;
        continue;
      }

      // Help and version win over the default subcommand.
      this.checkForTerminal(state);

      const fallback = state.node.defaultChild;
      if (fallback) {
        state.node = fallback;
        continue;
      }
      return;
    }
  }

  private parseCurrent(state: ParseState): void {
    const { node, stream } = state;
    let values: BoundValues;
    try {
      values = node.argumentSet.lenientParse(stream);
      node.argumentSet.checkRequired(values);
    } catch (e) {
      if (e instanceof ArgumentParseError) {
        this.checkForTerminal(state);
      }
      throw e;
    }

    stream.removeAll(values.usedOrigins());
    state.chain.push({ command: node, values });
    logCommandMatched(node.path, values.keys().length, stream.count);
  }

  private consumeNextCommand(state: ParseState): CommandNode | undefined {
    const next = state.stream.peekNext();
    if (!next || next.token.kind !== 'value') return undefined;
    const child = state.node.firstChild(next.token.value);
    if (!child) return undefined;
    state.stream.popNext();
    return child;
  }

  private checkForTerminal(state: ParseState): void {
    const { stream, node } = state;
    if (stream.contains(this.options.helpNames)) {
      throw new TerminalRequest({ kind: 'helpRequested', path: node.path, hidden: false });
    }
    if (stream.contains(this.options.hiddenHelpNames)) {
      throw new TerminalRequest({ kind: 'helpRequested', path: node.path, hidden: true });
    }
    const version = this.tree.definition.version;
    if (version !== undefined && stream.contains(this.options.versionNames)) {
      throw new TerminalRequest({ kind: 'versionRequested', version });
    }
  }

  /** `--generate-completion-script [shell]` anywhere on the command line. */
  private checkForCompletionRequest(stream: TokenStream): void {
    const wanted = nameKey(this.options.completionOption);
    const elements = stream.elements;
    const at = elements.findIndex((e) => e.token.kind === 'option' && nameKey(e.token.option.name) === wanted);
    if (at === -1) return;

    const found = elements[at].token;
    let shell: string | undefined;
    if (found.kind === 'option' && found.option.kind === 'nameWithValue') {
      shell = found.option.value;
    } else {
      const following = elements[at + 1];
      if (following && following.token.kind === 'value') shell = following.token.value;
    }
    throw new TerminalRequest({ kind: 'completionRequested', path: this.tree.path, shell });
  }

  private extractLast(state: ParseState): ParsedCommand {
    const { stream, node } = state;
    this.checkForTerminal(state);

    if (stream.containsNonTerminatorArguments) {
      for (const { index, token } of stream.elements) {
        // Digits of a leftover negative number are not options.
        if (index.sub !== 'complete' && stream.entry(tokenIndex(index.input))?.token.kind === 'possibleNegative') {
          continue;
        }
        if (token.kind === 'option') {
          const suggestion = suggestName(
            token.option.name,
            node.argumentSet.definitions,
            this.options.similarityFloor,
          );
          throw new ArgumentParseError(
            { kind: 'unknownOption', name: token.option.name, origin: InputOrigin.of(index), suggestion },
            stream.originalInput,
          );
        }
      }
      throw new ArgumentParseError(
        { kind: 'unexpectedValues', values: stream.coalescedExtraElements() },
        stream.originalInput,
      );
    }

    const last = state.chain[state.chain.length - 1];
    if (!last) {
      throw new ArgumentParseError({ kind: 'invalidState', reason: 'no command was matched' }, stream.originalInput);
    }
    return last;
  }
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}
