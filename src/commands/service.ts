import type { ActionContext, CommandTree } from '../cli/tree.js';
import { toError } from '../core/errors.js';
import { exitWithCode, type ControlSignal } from '../core/signals.js';
import type { ServiceAction, ServiceSupervisor } from '../service/supervisor.js';
import { println, success } from '../utils/ui.js';
import { fail } from './helpers.js';

/** Exit code of `service status` when the agent is not running */
export const SERVICE_NOT_RUNNING = 3;

const PAST_TENSE: Record<ServiceAction, string> = {
    start: 'started',
    stop: 'stopped',
    restart: 'restarted',
};

async function attempt(ctx: ActionContext, task: () => Promise<void>): Promise<ControlSignal | void> {
    try {
        await task();
    } catch (error) {
        return fail(ctx, toError(error));
    }
}

export function registerInstallCommands(tree: CommandTree, supervisor: ServiceSupervisor): void {
    tree.register([], {
        name: 'install',
        description: 'Install the volctl agent as a host service',
        action: async ctx =>
            attempt(ctx, async () => {
                await supervisor.install(ctx.state.configFile);
                success(ctx.state.io, 'volctl agent installed');
            }),
    });

    tree.register([], {
        name: 'uninstall',
        description: 'Remove the volctl agent service',
        action: async ctx =>
            attempt(ctx, async () => {
                await supervisor.uninstall();
                success(ctx.state.io, 'volctl agent uninstalled');
            }),
    });
}

export function registerServiceCommands(tree: CommandTree, supervisor: ServiceSupervisor): void {
    /**
     * Service Command
     * Controls the volctl agent through the host init system
     */
    tree.register([], {
        name: 'service',
        description: 'Manage the volctl agent service',
    });

    for (const action of ['start', 'stop', 'restart'] as const) {
        tree.register(['service'], {
            name: action,
            description: `${action[0].toUpperCase()}${action.slice(1)} the volctl agent`,
            action: async ctx =>
                attempt(ctx, async () => {
                    await supervisor.control(action);
                    success(ctx.state.io, `volctl agent ${PAST_TENSE[action]}`);
                }),
        });
    }

    tree.register(['service'], {
        name: 'status',
        description: 'Print the status of the volctl agent',
        action: async ctx => {
            try {
                const status = await supervisor.status();
                println(ctx.state.io, `volctl agent is ${status.state}`);
                if (!status.running) {
                    return exitWithCode(SERVICE_NOT_RUNNING);
                }
            } catch (error) {
                return fail(ctx, toError(error));
            }
        },
    });

    tree.register(['service'], {
        name: 'initsys',
        description: 'Print the detected init system',
        action: async ctx =>
            attempt(ctx, async () => {
                println(ctx.state.io, await supervisor.initSystem());
            }),
    });
}
