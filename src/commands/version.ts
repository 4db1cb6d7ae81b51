import type { CommandTree } from '../cli/tree.js';
import { println } from '../utils/ui.js';
import { VERSION } from '../version.js';

export function registerVersionCommand(tree: CommandTree): void {
    tree.register([], {
        name: 'version',
        description: 'Print the version',
        action: async ({ state }) => {
            println(state.io, `volctl ${VERSION}`);
        },
    });
}
