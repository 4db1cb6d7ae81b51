import type { Column } from '../cli/output.js';
import type { CommandTree } from '../cli/tree.js';
import { printItems } from './helpers.js';

interface EnvEntry {
    key: string;
    value: string;
}

const columns: Column<EnvEntry>[] = [
    { header: 'KEY', value: entry => entry.key },
    { header: 'VALUE', value: entry => entry.value },
];

export function registerEnvCommand(tree: CommandTree): void {
    /**
     * Env Command
     * Prints the effective configuration
     */
    tree.register([], {
        name: 'env',
        description: 'Print the effective configuration',
        action: async ctx => {
            const { config } = ctx.state;
            const entries = config.keys().map(key => ({ key, value: config.getString(key) }));
            printItems(ctx, entries, columns);
        },
    });
}
