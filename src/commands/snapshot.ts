import { asyncFlag } from '../cli/flags.js';
import type { Column } from '../cli/output.js';
import type { CommandTree } from '../cli/tree.js';
import { ConfigKeys } from '../config.js';
import { stringFlag } from '../core/state.js';
import type { Snapshot } from '../storage/types.js';
import { clientOf, list, runBatch } from './helpers.js';

const columns: Column<Snapshot>[] = [
    { header: 'ID', value: snapshot => snapshot.id },
    { header: 'NAME', value: snapshot => snapshot.name },
    { header: 'VOLUME', value: snapshot => snapshot.volumeID },
    { header: 'STATUS', value: snapshot => snapshot.status ?? '' },
];

export function registerSnapshotCommands(tree: CommandTree): void {
    tree.register([], {
        name: 'snapshot',
        aliases: ['snapshots', 'snap'],
        description: 'Manage volume snapshots',
    });

    tree.register(['snapshot'], {
        name: 'ls',
        aliases: ['list', 'get'],
        description: 'List snapshots, optionally narrowed to the given IDs or names',
        args: '[snapshot...]',
        activateClient: true,
        action: async ctx =>
            list(
                ctx,
                async client =>
                    (await client.listSnapshots()).filter(
                        snapshot =>
                            ctx.args.length === 0 || ctx.args.includes(snapshot.id) || ctx.args.includes(snapshot.name)
                    ),
                columns
            ),
    });

    tree.register(['snapshot'], {
        name: 'create',
        aliases: ['new'],
        description: 'Snapshot volumes',
        args: '<volumeID...>',
        activateClient: true,
        flags: [{ name: 'name', type: 'string', description: 'The snapshot name' }, asyncFlag],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'volumeID',
                action: 'snapshot volume',
                done: 'snapshotted volume',
                columns,
                run: volumeID =>
                    client.createSnapshot({
                        volumeID,
                        name: stringFlag(state.flags, 'name'),
                        idempotent: state.config.getBool(ConfigKeys.idempotent),
                    }),
            });
        },
    });

    tree.register(['snapshot'], {
        name: 'rm',
        aliases: ['remove', 'delete'],
        description: 'Remove snapshots',
        args: '<snapshotID...>',
        activateClient: true,
        flags: [asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'snapshotID',
                action: 'remove snapshot',
                done: 'removed snapshot',
                run: snapshotID => client.removeSnapshot(snapshotID),
            });
        },
    });

    tree.register(['snapshot'], {
        name: 'copy',
        aliases: ['cp'],
        description: 'Copy snapshots',
        args: '<snapshotID...>',
        activateClient: true,
        flags: [
            { name: 'name', type: 'string', description: 'The name of the copy' },
            { name: 'region', type: 'string', description: 'The region to copy the snapshot to' },
            asyncFlag,
        ],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'snapshotID',
                action: 'copy snapshot',
                done: 'copied snapshot',
                columns,
                run: snapshotID =>
                    client.copySnapshot(snapshotID, {
                        name: stringFlag(state.flags, 'name'),
                        region: stringFlag(state.flags, 'region'),
                    }),
            });
        },
    });
}
