// ============================================================================
// @argloom/core — Commands & Command Tree
// ============================================================================
//
// Commands are declared explicitly; subcommands are listed (or supplied
// lazily) by their parent. Building the tree validates every command's
// arguments and rejects a command reachable from itself.
// ============================================================================

import { ArgumentSet } from './argument_set.js';
import { ArgumentsValidationError, CommandCycleError, CommandDefinitionError } from './errors.js';
import type { ValidationIssue } from './errors.js';
import type { ArgumentInput } from './definitions.js';
import { flattenArguments, positionalArray } from './definitions.js';
import { debug, timer } from './logger.js';
import { validateArguments } from './validators.js';

export type SubcommandList = readonly CommandDefinition[] | (() => readonly CommandDefinition[]);

export interface CommandConfig {
  name: string;
  aliases?: readonly string[];
  /** One-line description, shown by external help renderers. */
  abstract?: string;
  /** Enables the version flags when set on the root command. */
  version?: string;
  arguments?: readonly ArgumentInput[];
  subcommands?: SubcommandList;
  /** Name of the child to run when no subcommand is given. */
  defaultSubcommand?: string;
  /** Backing keys the caller decodes into; every argument needs one. */
  keys?: readonly string[];
}

/**
 * A declared command. Identity matters: the same object reached twice on
 * one path is a cycle.
 */
export interface CommandDefinition {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly abstract?: string;
  readonly version?: string;
  readonly arguments: readonly ArgumentInput[];
  readonly subcommands: SubcommandList;
  readonly defaultSubcommand?: string;
  readonly keys?: readonly string[];
}

export function defineCommand(config: CommandConfig): CommandDefinition {
  if (config.name.trim().length === 0) {
    throw new CommandDefinitionError(config.name, 'Command names must not be empty.');
  }
  return Object.freeze({
    name: config.name,
    aliases: config.aliases ?? [],
    abstract: config.abstract,
    version: config.version,
    arguments: config.arguments ?? [],
    subcommands: config.subcommands ?? [],
    defaultSubcommand: config.defaultSubcommand,
    keys: config.keys,
  });
}

function resolveSubcommands(definition: CommandDefinition): readonly CommandDefinition[] {
  const { subcommands } = definition;
  return typeof subcommands === 'function' ? subcommands() : subcommands;
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

export class CommandNode {
  readonly definition: CommandDefinition;
  readonly argumentSet: ArgumentSet;
  readonly parent: CommandNode | undefined;
  readonly children: CommandNode[] = [];
  /** Set on the `help` subcommand the parser adds. */
  readonly builtinHelp: boolean;

  constructor(definition: CommandDefinition, parent: CommandNode | undefined, builtinHelp = false) {
    this.definition = definition;
    this.parent = parent;
    this.builtinHelp = builtinHelp;
    this.argumentSet = new ArgumentSet(flattenArguments(definition.arguments));
  }

  get name(): string {
    return this.definition.name;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  /** Command names from the root down to this node. */
  get path(): string[] {
    const names: string[] = [];
    for (let node: CommandNode | undefined = this; node; node = node.parent) {
      names.unshift(node.name);
    }
    return names;
  }

  /** The child answering to `name` or one of its aliases. */
  firstChild(name: string): CommandNode | undefined {
    return this.children.find((c) => c.name === name || c.definition.aliases.includes(name));
  }

  get defaultChild(): CommandNode | undefined {
    const name = this.definition.defaultSubcommand;
    return name === undefined ? undefined : this.children.find((c) => c.name === name);
  }

  /**
   * Follow `names` from this node as far as they name subcommands; stops at
   * the first name that doesn't.
   */
  descend(names: readonly string[]): CommandNode {
    let node: CommandNode = this;
    for (const name of names) {
      const child = node.firstChild(name);
      if (!child) break;
      node = child;
    }
    return node;
  }

  /** Depth-first walk, this node first. */
  *walk(): Generator<CommandNode> {
    yield this;
    for (const child of this.children) {
      yield* child.walk();
    }
  }
}

export interface BuildTreeOptions {
  /** Run the static validators (default true). */
  validate?: boolean;
  /** Add a `help` subcommand when the root has children (default true). */
  helpSubcommand?: boolean;
}

const HELP_COMMAND = defineCommand({
  name: 'help',
  abstract: 'Show subcommand help information.',
  arguments: [positionalArray('subcommands', { optional: true })],
});

/**
 * Build and validate the command tree rooted at `root`.
 *
 * @throws CommandCycleError when a command is its own descendant
 * @throws ArgumentsValidationError when any command's declarations are invalid
 */
export function buildCommandTree(root: CommandDefinition, options: BuildTreeOptions = {}): CommandNode {
  const t = timer('buildCommandTree');
  const onPath = new Set<CommandDefinition>();
  const issues: ValidationIssue[] = [];
  const validate = options.validate ?? true;

  const build = (definition: CommandDefinition, parent: CommandNode | undefined): CommandNode => {
    if (onPath.has(definition)) {
      const path = parent ? parent.path : [];
      throw new CommandCycleError([...path, definition.name]);
    }
    onPath.add(definition);

    const node = new CommandNode(definition, parent);
    if (validate) {
      issues.push(
        ...validateArguments({
          command: node.path.join(' '),
          definitions: node.argumentSet.definitions,
          keys: definition.keys,
        }),
      );
    }

    for (const child of resolveSubcommands(definition)) {
      node.children.push(build(child, node));
    }

    if (definition.defaultSubcommand !== undefined && !node.defaultChild) {
      throw new CommandDefinitionError(
        definition.name,
        `Default subcommand "${definition.defaultSubcommand}" is not a subcommand of "${definition.name}".`,
      );
    }

    onPath.delete(definition);
    return node;
  };

  const tree = build(root, undefined);

  if (issues.length > 0) {
    throw new ArgumentsValidationError(issues);
  }

  if ((options.helpSubcommand ?? true) && !tree.isLeaf && !tree.firstChild(HELP_COMMAND.name)) {
    tree.children.push(new CommandNode(HELP_COMMAND, tree, true));
  }

  const commands = [...tree.walk()].length;
  debug(`buildCommandTree: ${commands} commands under ${tree.name}`, { commands });
  t.end();
  return tree;
}
