/**
 * Lifecycle Pipeline
 *
 * Steps run once, in order, before a resolved command's action:
 *
 *   1. load-config        merge the config file into the file tier
 *   2. apply-log-level    apply volctl.logLevel to the logger
 *   3. apply-overrides    force CLI settings, copy host/service overrides
 *   4. help               print help and stop when --help/--verbose is set
 *   5. check-permissions  refuse sensitive commands the caller may not run
 *   6. activate-client    activate the storage client (marked commands only)
 *
 * A step either returns nothing and the next one runs, or returns a control
 * signal and the pipeline stops. A broken config file is not a signal: step
 * 1 throws ConfigLoadError and the run aborts.
 */

import { access } from 'node:fs/promises';
import { CONFIG_FILE_ENV, ConfigKeys } from '../config.js';
import type { ConfigValidator } from '../core/config-schema.js';
import { ContextKeys } from '../core/context.js';
import { ClientActivationError, ConfigLoadError, isVolctlError, toError } from '../core/errors.js';
import { parseLogLevel } from '../core/logger.js';
import { helpRequested, reportedError, type ControlSignal } from '../core/signals.js';
import { boolFlag, stringFlag, type InvocationState } from '../core/state.js';
import type { ClientActivator } from '../storage/activation.js';
import { println } from '../utils/ui.js';
import type { PermissionGate } from './permissions.js';
import type { ErrorPresenter } from './presenter.js';
import { effectiveFlags, type CommandTree, type Resolution } from './tree.js';

export type LifecycleStepName =
    | 'load-config'
    | 'apply-log-level'
    | 'apply-overrides'
    | 'help'
    | 'check-permissions'
    | 'activate-client';

export interface Invocation {
    state: InvocationState;
    command: Resolution;
}

export interface LifecycleStep {
    readonly name: LifecycleStepName;
    run(invocation: Invocation): Promise<ControlSignal | void>;
}

export interface LifecycleDeps {
    tree: CommandTree;
    validator: ConfigValidator;
    gate: PermissionGate;
    activator: ClientActivator;
    presenter: ErrorPresenter;
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Publishes parsed flags into the ConfigStore: defaults into the default
 * tier, explicitly given flags into the flag tier. Running it again after a
 * file load keeps flag values ahead of file values.
 */
export function bindFlags(state: InvocationState, command: Resolution): void {
    state.flags = { ...command.flags };
    for (const flag of effectiveFlags(command.node)) {
        if (!flag.configKey) {
            continue;
        }
        if (flag.default !== undefined) {
            state.config.setDefault(flag.configKey, flag.default);
        }
        const value = command.flags[flag.name];
        if (command.explicit.has(flag.name) && value !== undefined) {
            state.config.set(flag.configKey, value, 'flag');
        }
    }
}

/**
 * Config file path: an explicit --config, else VOLCTL_CONFIG_FILE, else
 * the flag's default
 */
export function configFilePath({ state, command }: Invocation): string | undefined {
    if (command.explicit.has('config')) {
        return stringFlag(command.flags, 'config');
    }
    return state.env[CONFIG_FILE_ENV] || stringFlag(command.flags, 'config');
}

/**
 * Renders the failure, prints the command's help and reports the error
 */
function reportFailure(deps: LifecycleDeps, invocation: Invocation, error: Error): ControlSignal {
    const { state, command } = invocation;
    deps.presenter.render(error, state.io.isTerminal);
    println(state.io);
    state.io.out(deps.tree.helpText(command.node));
    return reportedError(error);
}

export function loadConfigStep(deps: LifecycleDeps): LifecycleStep {
    return {
        name: 'load-config',
        async run(invocation) {
            const { state, command } = invocation;
            const path = configFilePath(invocation);
            if (!path || !(await fileExists(path))) {
                state.logger.debug({ path }, 'config file not found, skipping');
                return;
            }

            await deps.validator.validate(path);
            try {
                await state.config.readFile(path);
            } catch (error) {
                throw new ConfigLoadError(path, toError(error).message, error);
            }

            state.configFile = path;
            state.env[CONFIG_FILE_ENV] = path;
            bindFlags(state, command);
            state.logger.debug({ path }, 'loaded config file');
        },
    };
}

export function applyLogLevelStep(): LifecycleStep {
    return {
        name: 'apply-log-level',
        async run({ state }) {
            const level = parseLogLevel(state.config.get(ConfigKeys.logLevel));
            if (!level) {
                return;
            }
            state.logger.level = level;
            state.config.set(ConfigKeys.logLevel, level);
            state.context = state.context.withValue(ContextKeys.logLevel, level);
            state.logger.info({ logLevel: level }, 'updated log level');
        },
    };
}

export function applyOverridesStep(): LifecycleStep {
    return {
        name: 'apply-overrides',
        async run({ state }) {
            // path caching is never useful for a short-lived CLI process
            state.config.set(ConfigKeys.pathCacheEnabled, false);

            const host = state.config.getString(ConfigKeys.host);
            if (host) {
                state.config.override(ConfigKeys.storageHost, host);
            }
            const service = state.config.getString(ConfigKeys.service);
            if (service) {
                state.config.override(ConfigKeys.storageService, service);
            }
        },
    };
}

export function helpStep(deps: LifecycleDeps): LifecycleStep {
    return {
        name: 'help',
        async run({ state, command }) {
            if (!boolFlag(command.flags, 'help') && !boolFlag(command.flags, 'verbose')) {
                return;
            }
            state.io.out(deps.tree.helpText(command.node));
            return helpRequested();
        },
    };
}

export function checkPermissionsStep(deps: LifecycleDeps): LifecycleStep {
    return {
        name: 'check-permissions',
        async run(invocation) {
            const denied = deps.gate.check(invocation.command.node.path);
            if (denied) {
                return reportFailure(deps, invocation, denied);
            }
        },
    };
}

export function activateClientStep(deps: LifecycleDeps): LifecycleStep {
    return {
        name: 'activate-client',
        async run(invocation) {
            const { state, command } = invocation;
            if (!command.node.activateClient) {
                return;
            }

            if (boolFlag(command.flags, 'async')) {
                state.context = state.context.withValue(ContextKeys.async, true);
            }

            const commandName = command.node.path.join(' ');
            state.logger.debug({ cmd: commandName }, 'activating storage client');

            try {
                const activation = await deps.activator.activate(state.context, state.config);
                state.context = activation.context;
                state.config = activation.config;
                state.errors = activation.errors;

                state.logger.debug({ cmd: commandName }, 'creating storage client');
                state.client = await deps.activator.createClient(activation);
            } catch (error) {
                const failure = isVolctlError(error)
                    ? error
                    : new ClientActivationError(toError(error).message, { cause: error });
                return reportFailure(deps, invocation, failure);
            }
        },
    };
}

/**
 * The pipeline in its fixed order
 */
export function createLifecycle(deps: LifecycleDeps): LifecycleStep[] {
    return [
        loadConfigStep(deps),
        applyLogLevelStep(),
        applyOverridesStep(),
        helpStep(deps),
        checkPermissionsStep(deps),
        activateClientStep(deps),
    ];
}

/**
 * Runs the steps in order and returns the first signal raised
 */
export async function runLifecycle(
    steps: readonly LifecycleStep[],
    invocation: Invocation
): Promise<ControlSignal | undefined> {
    for (const step of steps) {
        invocation.state.logger.trace({ step: step.name }, 'lifecycle step');
        const signal = await step.run(invocation);
        if (signal) {
            return signal;
        }
    }
    return undefined;
}
