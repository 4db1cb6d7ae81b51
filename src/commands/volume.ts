/**
 * Volume Commands
 *
 * Every command but ls takes one or more volume IDs and applies the
 * operation to each in turn.
 */

import { asyncFlag, forceFlag } from '../cli/flags.js';
import type { Column } from '../cli/output.js';
import type { CommandTree, FlagSpec } from '../cli/tree.js';
import { ConfigKeys } from '../config.js';
import { boolFlag, intFlag, stringFlag } from '../core/state.js';
import type { Volume } from '../storage/types.js';
import { clientOf, list, runBatch } from './helpers.js';

interface VolumePath {
    volumeID: string;
    path: string;
}

export const volumeColumns: Column<Volume>[] = [
    { header: 'ID', value: volume => volume.id },
    { header: 'NAME', value: volume => volume.name },
    { header: 'STATUS', value: volume => volume.status ?? '' },
    { header: 'SIZE', value: volume => (volume.size === undefined ? '' : String(volume.size)) },
];

const pathColumns: Column<VolumePath>[] = [
    { header: 'ID', value: entry => entry.volumeID },
    { header: 'PATH', value: entry => entry.path },
];

const encryptionKeyFlag: FlagSpec = {
    name: 'encryptionKey',
    type: 'string',
    description: 'The key used to encrypt the volume',
};

const matchesVolume = (targets: readonly string[]) => (volume: Volume) =>
    targets.length === 0 || targets.includes(volume.id) || targets.includes(volume.name);

export function registerVolumeCommands(tree: CommandTree): void {
    tree.register([], {
        name: 'volume',
        aliases: ['volumes', 'vol'],
        description: 'Manage volumes',
    });

    tree.register(['volume'], {
        name: 'ls',
        aliases: ['list', 'get', 'inspect'],
        description: 'List volumes, optionally narrowed to the given IDs or names',
        args: '[volume...]',
        activateClient: true,
        flags: [
            { name: 'attached', type: 'boolean', description: 'Only volumes attached to this host', default: false },
            { name: 'available', type: 'boolean', description: 'Only volumes available to attach', default: false },
        ],
        action: async ctx => {
            const { flags } = ctx.state;
            const filter = { attached: boolFlag(flags, 'attached'), available: boolFlag(flags, 'available') };
            return list(
                ctx,
                async client => (await client.listVolumes(filter)).filter(matchesVolume(ctx.args)),
                volumeColumns
            );
        },
    });

    tree.register(['volume'], {
        name: 'create',
        aliases: ['new'],
        description: 'Create volumes',
        args: '<name...>',
        activateClient: true,
        flags: [
            { name: 'size', type: 'int', description: 'The size of the volume in GiB' },
            { name: 'iops', type: 'int', description: 'The provisioned IOPS' },
            { name: 'type', type: 'string', description: 'The volume type' },
            { name: 'availabilityZone', type: 'string', description: 'The availability zone' },
            { name: 'encrypted', type: 'boolean', description: 'Encrypt the volume', default: false },
            encryptionKeyFlag,
            asyncFlag,
        ],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'volume name',
                action: 'create volume',
                done: 'created volume',
                columns: volumeColumns,
                run: name =>
                    client.createVolume({
                        name,
                        size: intFlag(state.flags, 'size'),
                        iops: intFlag(state.flags, 'iops'),
                        type: stringFlag(state.flags, 'type'),
                        availabilityZone: stringFlag(state.flags, 'availabilityZone'),
                        encrypted: boolFlag(state.flags, 'encrypted'),
                        encryptionKey: stringFlag(state.flags, 'encryptionKey'),
                        idempotent: state.config.getBool(ConfigKeys.idempotent),
                    }),
            });
        },
    });

    tree.register(['volume'], {
        name: 'rm',
        aliases: ['remove', 'delete'],
        description: 'Remove volumes',
        args: '<volumeID...>',
        activateClient: true,
        flags: [forceFlag, asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            const force = boolFlag(ctx.state.flags, 'force');
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'remove volume',
                done: 'removed volume',
                run: volumeID => client.removeVolume(volumeID, force),
            });
        },
    });

    tree.register(['volume'], {
        name: 'attach',
        description: 'Attach volumes to this host',
        args: '<volumeID...>',
        activateClient: true,
        flags: [forceFlag, encryptionKeyFlag, asyncFlag],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'attach volume',
                done: 'attached volume',
                columns: volumeColumns,
                run: volumeID =>
                    client.attachVolume(volumeID, {
                        force: boolFlag(state.flags, 'force'),
                        encryptionKey: stringFlag(state.flags, 'encryptionKey'),
                        idempotent: state.config.getBool(ConfigKeys.idempotent),
                    }),
            });
        },
    });

    tree.register(['volume'], {
        name: 'detach',
        description: 'Detach volumes from this host',
        args: '<volumeID...>',
        activateClient: true,
        flags: [forceFlag, asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            const force = boolFlag(ctx.state.flags, 'force');
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'detach volume',
                done: 'detached volume',
                columns: volumeColumns,
                run: volumeID => client.detachVolume(volumeID, force),
            });
        },
    });

    tree.register(['volume'], {
        name: 'mount',
        description: 'Attach and mount volumes on this host',
        args: '<volumeID...>',
        activateClient: true,
        flags: [
            { name: 'fsType', type: 'string', description: 'The filesystem to create when the volume has none' },
            { name: 'overwriteFs', type: 'boolean', description: 'Overwrite an existing filesystem', default: false },
            encryptionKeyFlag,
            asyncFlag,
        ],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'mount volume',
                done: 'mounted volume',
                columns: pathColumns,
                run: async volumeID => {
                    const mounted = await client.mountVolume(volumeID, {
                        fsType: stringFlag(state.flags, 'fsType'),
                        overwriteFs: boolFlag(state.flags, 'overwriteFs'),
                        encryptionKey: stringFlag(state.flags, 'encryptionKey'),
                        idempotent: state.config.getBool(ConfigKeys.idempotent),
                    });
                    return mounted && { volumeID, path: mounted.path };
                },
            });
        },
    });

    tree.register(['volume'], {
        name: 'unmount',
        aliases: ['umount'],
        description: 'Unmount volumes on this host',
        args: '<volumeID...>',
        activateClient: true,
        flags: [asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'unmount volume',
                done: 'unmounted volume',
                run: volumeID => client.unmountVolume(volumeID),
            });
        },
    });

    tree.register(['volume'], {
        name: 'path',
        description: 'Print the mount path of volumes',
        args: '<volumeID...>',
        activateClient: true,
        action: async ctx => {
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'look up the path of volume',
                done: 'found the path of volume',
                columns: pathColumns,
                run: async volumeID => ({ volumeID, path: (await client.volumePath(volumeID)).path }),
            });
        },
    });
}
