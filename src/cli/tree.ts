/**
 * Command Tree
 *
 * The fixed hierarchy of volctl commands. Nodes and flags are plain project
 * types; commander is only used behind CommanderTree to parse a resolved
 * node's flags and to render its help, so the lifecycle and the runner
 * never see commander's types.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { FlagParseError } from '../core/errors.js';
import type { ControlSignal } from '../core/signals.js';
import type { FlagValue, FlagValues, InvocationState } from '../core/state.js';
import type { ErrorPresenter } from './presenter.js';

export type FlagType = 'string' | 'boolean' | 'int';

export interface FlagSpec {
    name: string;
    short?: string;
    type: FlagType;
    description: string;
    default?: FlagValue;
    choices?: readonly string[];
    /** Inherited by every descendant of the declaring command */
    persistent?: boolean;
    /** ConfigStore key the flag feeds */
    configKey?: string;
}

/**
 * Everything a command action receives
 */
export interface ActionContext {
    state: InvocationState;
    node: CommandNode;
    /** Tokens after the command path that were not flags */
    args: string[];
    presenter: ErrorPresenter;
    helpText(): string;
}

export type CommandAction = (context: ActionContext) => Promise<ControlSignal | void>;

export interface CommandSpec {
    name: string;
    description: string;
    aliases?: string[];
    /** Argument synopsis for help, e.g. "[volumeID...]" */
    args?: string;
    flags?: FlagSpec[];
    action?: CommandAction;
    /** Run storage client activation before the action */
    activateClient?: boolean;
}

export interface CommandNode {
    readonly name: string;
    readonly aliases: readonly string[];
    readonly description: string;
    readonly args?: string;
    readonly parent?: CommandNode;
    readonly children: CommandNode[];
    readonly flags: readonly FlagSpec[];
    readonly action?: CommandAction;
    readonly activateClient: boolean;
    /** Names from the root (exclusive) down to this node */
    readonly path: readonly string[];
}

export interface Resolution {
    node: CommandNode;
    args: string[];
    /** Every effective flag with its parsed or default value */
    flags: FlagValues;
    /** Flags given explicitly on the command line */
    explicit: ReadonlySet<string>;
}

export interface CommandTree {
    readonly root: CommandNode;
    register(parentPath: readonly string[], spec: CommandSpec): CommandNode;
    find(path: readonly string[]): CommandNode | undefined;
    /**
     * Resolves argv to exactly one node
     * @throws FlagParseError when the remaining tokens are not valid flags for that node
     */
    resolve(argv: readonly string[]): Resolution;
    helpText(node: CommandNode): string;
}

function createNode(spec: CommandSpec, parent?: CommandNode): CommandNode {
    return {
        name: spec.name,
        aliases: spec.aliases ?? [],
        description: spec.description,
        args: spec.args,
        parent,
        children: [],
        flags: spec.flags ?? [],
        action: spec.action,
        activateClient: spec.activateClient ?? false,
        path: parent ? [...parent.path, spec.name] : [],
    };
}

function matches(node: CommandNode, token: string): boolean {
    return node.name === token || node.aliases.includes(token);
}

export function findChild(node: CommandNode, token: string): CommandNode | undefined {
    return node.children.find(child => matches(child, token));
}

/**
 * Local flags plus persistent flags inherited from ancestors. A local flag
 * shadows an inherited one of the same name; an inherited flag whose short
 * name is taken keeps only its long form.
 */
export function effectiveFlags(node: CommandNode): FlagSpec[] {
    const flags = [...node.flags];
    const names = new Set(flags.map(flag => flag.name));
    const shorts = new Set(flags.flatMap(flag => (flag.short ? [flag.short] : [])));

    for (let ancestor = node.parent; ancestor; ancestor = ancestor.parent) {
        for (const flag of ancestor.flags) {
            if (!flag.persistent || names.has(flag.name)) {
                continue;
            }
            const inherited = flag.short && shorts.has(flag.short) ? { ...flag, short: undefined } : flag;
            flags.push(inherited);
            names.add(inherited.name);
            if (inherited.short) {
                shorts.add(inherited.short);
            }
        }
    }
    return flags;
}

function parseIntFlag(value: string): number {
    if (!/^-?\d+$/.test(value)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return Number.parseInt(value, 10);
}

const BOOLEAN_VALUES = new Map<string, boolean>([
    ['1', true],
    ['t', true],
    ['true', true],
    ['0', false],
    ['f', false],
    ['false', false],
]);

/**
 * Options for one flag. Every boolean also gets a --no-<name> form sharing
 * its value; it is only listed in help when the flag defaults to true.
 */
function optionsFor(flag: FlagSpec): Option[] {
    const long = `--${flag.name}`;
    const names = flag.short ? `-${flag.short}, ${long}` : long;
    const placeholder = flag.type === 'boolean' ? '' : flag.type === 'int' ? ' <n>' : ` <${flag.name}>`;

    const option = new Option(names + placeholder, flag.description);
    if (flag.type === 'int') {
        option.argParser(parseIntFlag);
    }
    if (flag.choices) {
        option.choices(flag.choices);
    }
    if (flag.default !== undefined) {
        option.default(flag.default);
    }
    if (flag.type !== 'boolean') {
        return [option];
    }

    const negation = new Option(`--no-${flag.name}`, `Turn off --${flag.name}`);
    if (flag.default !== true) {
        negation.hideHelp();
    }
    return [option, negation];
}

/**
 * Rewrites --<name>=<bool> for boolean flags into --<name> or --no-<name>
 * @throws FlagParseError when the value is not a boolean
 */
function expandBooleanValues(
    tokens: readonly string[],
    flags: readonly FlagSpec[],
    path: readonly string[]
): string[] {
    const booleans = new Set(flags.filter(flag => flag.type === 'boolean').map(flag => flag.name));
    const result: string[] = [];
    for (const [index, token] of tokens.entries()) {
        if (token === '--') {
            result.push(...tokens.slice(index));
            break;
        }
        const match = /^--([^=]+)=(.*)$/.exec(token);
        if (!match || !booleans.has(match[1])) {
            result.push(token);
            continue;
        }
        const value = BOOLEAN_VALUES.get(match[2].toLowerCase());
        if (value === undefined) {
            throw new FlagParseError(`option '--${match[1]}' argument '${match[2]}' is invalid. Not a boolean.`, path);
        }
        result.push(value ? `--${match[1]}` : `--no-${match[1]}`);
    }
    return result;
}

/**
 * The persistent flag a token names, when it names one of the node's
 */
function persistentFlagFor(node: CommandNode, token: string): FlagSpec | undefined {
    if (!token.startsWith('-') || token === '--') {
        return undefined;
    }
    const name = token.startsWith('--') ? token.slice(2).split('=')[0].replace(/^no-/, '') : undefined;
    return effectiveFlags(node).find(
        flag =>
            flag.persistent &&
            (name !== undefined ? flag.name === name : flag.short !== undefined && token === `-${flag.short}`)
    );
}

function isFlagValue(value: unknown): value is FlagValue {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * A bare command carrying only a name, used to give usage lines their path
 */
function ancestorShell(node: CommandNode): Command {
    const command = new Command(node.name);
    if (node.parent) {
        ancestorShell(node.parent).addCommand(command);
    }
    return command;
}

function silent(command: Command): Command {
    return command
        .helpOption(false)
        .helpCommand(false)
        .exitOverride()
        .configureOutput({
            writeOut: () => undefined,
            writeErr: () => undefined,
            outputError: () => undefined,
        });
}

/**
 * CommandTree backed by commander
 */
export class CommanderTree implements CommandTree {
    readonly root: CommandNode;

    constructor(root: Omit<CommandSpec, 'aliases'>) {
        this.root = createNode(root);
    }

    register(parentPath: readonly string[], spec: CommandSpec): CommandNode {
        const parent = this.find(parentPath);
        if (!parent) {
            throw new Error(`No command registered at "${parentPath.join(' ')}"`);
        }
        for (const token of [spec.name, ...(spec.aliases ?? [])]) {
            if (findChild(parent, token)) {
                throw new Error(`Duplicate command "${[...parent.path, token].join(' ')}"`);
            }
        }
        const node = createNode(spec, parent);
        parent.children.push(node);
        return node;
    }

    find(path: readonly string[]): CommandNode | undefined {
        let node: CommandNode | undefined = this.root;
        for (const name of path) {
            node = findChild(node, name);
            if (!node) {
                return undefined;
            }
        }
        return node;
    }

    resolve(argv: readonly string[]): Resolution {
        let node = this.root;
        // persistent flags given ahead of the command path, in long form
        const leading: string[] = [];
        let index = 0;
        while (index < argv.length) {
            const token = argv[index];
            const flag = persistentFlagFor(node, token);
            if (flag) {
                leading.push(token.startsWith('--') ? token : `--${flag.name}`);
                index++;
                if (flag.type !== 'boolean' && !token.includes('=') && index < argv.length) {
                    leading.push(argv[index]);
                    index++;
                }
                continue;
            }
            const child = findChild(node, token);
            if (!child) {
                break;
            }
            node = child;
            index++;
        }

        const command = this.build(node);
        const flagSpecs = effectiveFlags(node);
        const tokens = expandBooleanValues([...leading, ...argv.slice(index)], flagSpecs, node.path);
        let parsed: { operands: string[]; unknown: string[] };
        try {
            parsed = command.parseOptions(tokens);
        } catch (error) {
            if (error instanceof CommanderError) {
                throw new FlagParseError(error.message.replace(/^error: /, ''), node.path, error);
            }
            throw error;
        }

        if (parsed.unknown.length > 0) {
            throw new FlagParseError(`unknown flag '${parsed.unknown[0]}'`, node.path);
        }

        const values: Record<string, unknown> = command.opts();
        const flags: FlagValues = {};
        const explicit = new Set<string>();
        for (const flag of flagSpecs) {
            const value = values[flag.name];
            if (isFlagValue(value)) {
                flags[flag.name] = value;
            }
            if (command.getOptionValueSource(flag.name) === 'cli') {
                explicit.add(flag.name);
            }
        }

        return { node, args: parsed.operands, flags, explicit };
    }

    helpText(node: CommandNode): string {
        return this.build(node).helpInformation();
    }

    private build(node: CommandNode): Command {
        const command = silent(new Command(node.name)).description(node.description);
        if (node.aliases.length > 0) {
            command.aliases(node.aliases);
        }
        if (node.args) {
            command.argument(node.args);
        }
        for (const flag of effectiveFlags(node)) {
            for (const option of optionsFor(flag)) {
                command.addOption(option);
            }
        }
        for (const child of node.children) {
            const stub = new Command(child.name).description(child.description);
            if (child.aliases.length > 0) {
                stub.aliases(child.aliases);
            }
            command.addCommand(stub);
        }
        if (node.parent) {
            ancestorShell(node.parent).addCommand(command);
        }
        return command;
    }
}
