/**
 * volctl Runner
 *
 * The single point where control signals are consumed. execute() builds
 * the command tree, resolves argv to one command, runs the lifecycle and
 * the command's action, and turns the resulting signal into the process
 * exit code. Anything that is not a signal is a fault: it is logged at
 * fatal and re-thrown. The async error stream is drained on every path.
 */

import { registerAdapterCommands } from '../commands/adapter.js';
import { registerDeviceCommands } from '../commands/device.js';
import { registerEnvCommand } from '../commands/env.js';
import { registerModuleCommands } from '../commands/module.js';
import { registerSnapshotCommands } from '../commands/snapshot.js';
import { registerInstallCommands, registerServiceCommands } from '../commands/service.js';
import { registerVersionCommand } from '../commands/version.js';
import { registerVolumeCommands } from '../commands/volume.js';
import { schemaValidator, type ConfigValidator } from '../core/config-schema.js';
import { FlagParseError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { exitCodeFor, reportedError, subcommandHandled, type ControlSignal } from '../core/signals.js';
import { createInvocationState, type InvocationState } from '../core/state.js';
import { SystemdSupervisor, type ServiceSupervisor } from '../service/supervisor.js';
import { httpActivator, type ClientActivator } from '../storage/activation.js';
import { println, processIo, type Io } from '../utils/ui.js';
import { rootFlags } from './flags.js';
import { bindFlags, createLifecycle, runLifecycle, type LifecycleStep } from './lifecycle.js';
import { createPermissionGate, type PermissionGate } from './permissions.js';
import { ErrorPresenter } from './presenter.js';
import { CommanderTree, type CommandTree, type Resolution } from './tree.js';

export interface CliOptions {
    io?: Io;
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
    validator?: ConfigValidator;
    gate?: PermissionGate;
    activator?: ClientActivator;
    supervisor?: ServiceSupervisor;
}

export interface CommandDeps {
    supervisor: ServiceSupervisor;
}

/**
 * Builds the complete volctl command hierarchy
 */
export function buildTree(deps: CommandDeps): CommandTree {
    const tree = new CommanderTree({
        name: 'volctl',
        description: 'Manage storage volumes, snapshots and devices',
        flags: rootFlags,
    });

    registerEnvCommand(tree);
    registerVersionCommand(tree);
    registerInstallCommands(tree, deps.supervisor);
    registerModuleCommands(tree);
    registerServiceCommands(tree, deps.supervisor);
    registerAdapterCommands(tree);
    registerVolumeCommands(tree);
    registerSnapshotCommands(tree);
    registerDeviceCommands(tree);

    return tree;
}

/**
 * Stops the async error stream and logs whatever it still holds
 */
async function drainErrors(state: InvocationState): Promise<void> {
    const { errors } = state;
    if (!errors) {
        return;
    }
    errors.stop();
    for await (const error of errors) {
        state.logger.error({ err: error }, error.message);
    }
}

export class Cli {
    readonly tree: CommandTree;
    private readonly io: Io;
    private readonly presenter: ErrorPresenter;
    private readonly steps: LifecycleStep[];
    private readonly options: CliOptions;

    constructor(options: CliOptions = {}) {
        this.options = options;
        this.tree = buildTree({ supervisor: options.supervisor ?? new SystemdSupervisor() });

        this.io = options.io ?? processIo();
        this.presenter = new ErrorPresenter(this.io);
        this.steps = createLifecycle({
            tree: this.tree,
            validator: options.validator ?? schemaValidator,
            gate: options.gate ?? createPermissionGate(),
            activator: options.activator ?? httpActivator,
            presenter: this.presenter,
        });
    }

    /**
     * Runs one invocation and returns its exit code
     * @throws the original fault when execution fails outside the signal paths
     */
    async execute(argv: readonly string[], state: InvocationState = this.createState()): Promise<number> {
        try {
            const signal = await this.dispatch(argv, state);
            if (signal?.kind === 'exit-with-code') {
                state.logger.debug({ code: signal.code }, 'exiting with code');
            }
            return exitCodeFor(signal);
        } catch (error) {
            state.logger.fatal({ err: toError(error) }, toError(error).message);
            throw error;
        } finally {
            await drainErrors(state);
        }
    }

    createState(): InvocationState {
        const { env, logger } = this.options;
        return createInvocationState({ io: this.io, env, logger });
    }

    private async dispatch(argv: readonly string[], state: InvocationState): Promise<ControlSignal | undefined> {
        const command = this.resolve(argv, state);
        if (!('node' in command)) {
            return command;
        }

        const { node } = command;
        state.logger = state.logger.child({ cmd: node.path.join(' ') });
        bindFlags(state, command);

        if (!node.action) {
            state.io.out(this.tree.helpText(node));
            return subcommandHandled();
        }

        const signal = await runLifecycle(this.steps, { state, command });
        if (signal) {
            return signal;
        }

        state.logger.debug({ args: command.args }, 'running command');
        const result = await node.action({
            state,
            node,
            args: command.args,
            presenter: this.presenter,
            helpText: () => this.tree.helpText(node),
        });
        return result ?? undefined;
    }

    /**
     * Resolves argv; malformed flags are reported here with the help of the
     * command they were given to
     */
    private resolve(argv: readonly string[], state: InvocationState): Resolution | ControlSignal {
        try {
            return this.tree.resolve(argv);
        } catch (error) {
            if (!(error instanceof FlagParseError)) {
                throw error;
            }
            this.presenter.render(error, state.io.isTerminal);
            println(state.io);
            state.io.out(this.tree.helpText(this.tree.find(error.commandPath) ?? this.tree.root));
            return reportedError(error);
        }
    }
}

/**
 * Runs volctl with the given arguments
 */
export async function execute(argv: readonly string[], options: CliOptions = {}): Promise<number> {
    return new Cli(options).execute(argv);
}
