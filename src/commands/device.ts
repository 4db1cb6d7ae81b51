import { asyncFlag } from '../cli/flags.js';
import type { Column } from '../cli/output.js';
import type { CommandTree } from '../cli/tree.js';
import { boolFlag, stringFlag } from '../core/state.js';
import type { Device } from '../storage/types.js';
import { clientOf, list, runBatch, usageError } from './helpers.js';

const columns: Column<Device>[] = [
    { header: 'NAME', value: device => device.name },
    { header: 'VOLUME', value: device => device.volumeID ?? '' },
    { header: 'MOUNTPOINT', value: device => device.mountPoint ?? '' },
    { header: 'FSTYPE', value: device => device.fsType ?? '' },
];

export function registerDeviceCommands(tree: CommandTree): void {
    tree.register([], {
        name: 'device',
        aliases: ['devices', 'dev'],
        description: 'Manage block devices on this host',
    });

    tree.register(['device'], {
        name: 'ls',
        aliases: ['list', 'get'],
        description: 'List block devices',
        activateClient: true,
        action: async ctx => list(ctx, client => client.listDevices(), columns),
    });

    tree.register(['device'], {
        name: 'mount',
        description: 'Mount a device',
        args: '<deviceName>',
        activateClient: true,
        flags: [
            { name: 'mountPoint', short: 'm', type: 'string', description: 'Where to mount the device' },
            { name: 'mountOptions', short: 'o', type: 'string', description: 'Options passed to mount' },
            { name: 'mountLabel', type: 'string', description: 'The SELinux label of the mount' },
            asyncFlag,
        ],
        action: async ctx => {
            const { state } = ctx;
            const mountPoint = stringFlag(state.flags, 'mountPoint');
            if (!mountPoint) {
                return usageError(ctx, '--mountPoint is required');
            }
            const client = clientOf(state);
            return runBatch(ctx, ctx.args, {
                target: 'device name',
                action: 'mount device',
                done: 'mounted device',
                columns,
                run: deviceName =>
                    client.mountDevice(deviceName, {
                        mountPoint,
                        mountOptions: stringFlag(state.flags, 'mountOptions'),
                        mountLabel: stringFlag(state.flags, 'mountLabel'),
                    }),
            });
        },
    });

    tree.register(['device'], {
        name: 'unmount',
        aliases: ['umount'],
        description: 'Unmount devices by mount point',
        args: '<mountPoint...>',
        activateClient: true,
        flags: [asyncFlag],
        action: async ctx => {
            const client = clientOf(ctx.state);
            return runBatch(ctx, ctx.args, {
                target: 'mount point',
                action: 'unmount',
                done: 'unmounted',
                run: mountPoint => client.unmountDevice(mountPoint),
            });
        },
    });

    tree.register(['device'], {
        name: 'format',
        description: 'Create a filesystem on devices',
        args: '<deviceName...>',
        activateClient: true,
        flags: [
            { name: 'fsType', type: 'string', description: 'The filesystem type', default: 'ext4' },
            { name: 'overwriteFs', type: 'boolean', description: 'Overwrite an existing filesystem', default: false },
            asyncFlag,
        ],
        action: async ctx => {
            const { state } = ctx;
            const client = clientOf(state);
            const fsType = stringFlag(state.flags, 'fsType') ?? 'ext4';
            return runBatch(ctx, ctx.args, {
                target: 'device name',
                action: `format (${fsType}) device`,
                done: `formatted (${fsType}) device`,
                columns,
                run: deviceName =>
                    client.formatDevice(deviceName, { fsType, overwriteFs: boolFlag(state.flags, 'overwriteFs') }),
            });
        },
    });
}
