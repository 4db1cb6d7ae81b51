import type { Column } from '../cli/output.js';
import type { CommandTree } from '../cli/tree.js';
import type { AdapterInstance, AdapterType } from '../storage/types.js';
import { list } from './helpers.js';

const typeColumns: Column<AdapterType>[] = [
    { header: 'NAME', value: type => type.name },
    { header: 'DESCRIPTION', value: type => type.description ?? '' },
];

const instanceColumns: Column<AdapterInstance>[] = [
    { header: 'NAME', value: instance => instance.name },
    { header: 'DRIVER', value: instance => instance.driver },
    { header: 'SERVICE', value: instance => instance.service },
];

export function registerAdapterCommands(tree: CommandTree): void {
    tree.register([], {
        name: 'adapter',
        aliases: ['adapters'],
        description: 'Inspect storage adapters',
    });

    tree.register(['adapter'], {
        name: 'types',
        description: 'List the available storage adapter types',
        activateClient: true,
        action: async ctx => list(ctx, client => client.listAdapterTypes(), typeColumns),
    });

    tree.register(['adapter'], {
        name: 'instances',
        aliases: ['ls'],
        description: 'List the configured storage adapter instances',
        activateClient: true,
        action: async ctx => list(ctx, client => client.listAdapterInstances(), instanceColumns),
    });
}
