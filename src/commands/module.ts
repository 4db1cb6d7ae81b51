import { asyncFlag } from '../cli/flags.js';
import type { Column } from '../cli/output.js';
import type { CommandTree } from '../cli/tree.js';
import { boolFlag, stringFlag } from '../core/state.js';
import type { ModuleInstance, ModuleType } from '../storage/types.js';
import { clientOf, list, runBatch, usageError } from './helpers.js';

const typeColumns: Column<ModuleType>[] = [
    { header: 'NAME', value: type => type.name },
    { header: 'DESCRIPTION', value: type => type.description ?? '' },
];

const instanceColumns: Column<ModuleInstance>[] = [
    { header: 'ID', value: instance => String(instance.id) },
    { header: 'NAME', value: instance => instance.name },
    { header: 'TYPE', value: instance => instance.typeName },
    { header: 'ADDRESS', value: instance => instance.address },
    { header: 'STARTED', value: instance => String(instance.isStarted) },
];

export function registerModuleCommands(tree: CommandTree): void {
    tree.register([], {
        name: 'module',
        aliases: ['modules', 'mod'],
        description: 'Manage storage agent modules',
    });

    tree.register(['module'], {
        name: 'types',
        description: 'List the available module types',
        activateClient: true,
        action: async ctx => list(ctx, client => client.listModuleTypes(), typeColumns),
    });

    tree.register(['module'], {
        name: 'instance',
        aliases: ['instances', 'i'],
        description: 'Manage module instances',
    });

    tree.register(['module', 'instance'], {
        name: 'ls',
        aliases: ['list'],
        description: 'List the running module instances',
        activateClient: true,
        action: async ctx => list(ctx, client => client.listModuleInstances(), instanceColumns),
    });

    tree.register(['module', 'instance'], {
        name: 'create',
        aliases: ['new'],
        description: 'Create a module instance',
        args: '<name>',
        activateClient: true,
        flags: [
            { name: 'type', short: 't', type: 'string', description: 'The module type' },
            { name: 'address', short: 'a', type: 'string', description: 'The address the module listens on' },
            { name: 'options', short: 'o', type: 'string', description: 'Module configuration as YAML' },
            { name: 'start', type: 'boolean', description: 'Start the module once created', default: false },
            asyncFlag,
        ],
        action: async ctx => {
            const { flags } = ctx.state;
            const typeName = stringFlag(flags, 'type');
            const address = stringFlag(flags, 'address');
            if (!typeName || !address) {
                return usageError(ctx, '--type and --address are required');
            }
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'module name',
                action: 'create module instance',
                done: 'created module instance',
                columns: instanceColumns,
                run: name =>
                    client.createModuleInstance({
                        name,
                        typeName,
                        address,
                        start: boolFlag(flags, 'start'),
                        config: stringFlag(flags, 'options'),
                    }),
            });
        },
    });

    tree.register(['module', 'instance'], {
        name: 'start',
        description: 'Start module instances',
        args: '<name...>',
        activateClient: true,
        flags: [asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'module name',
                action: 'start module instance',
                done: 'started module instance',
                columns: instanceColumns,
                run: name => client.startModuleInstance(name),
            });
        },
    });
}
