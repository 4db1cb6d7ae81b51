/**
 * Service Supervisor
 *
 * Installs the volctl storage agent as a host service and controls it
 * through the init system. Only systemd is driven; other init systems are
 * detected and reported so the user gets a clear refusal.
 */

import { access, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ServiceError } from '../core/errors.js';
import { runCommand, type CommandRunner } from './exec.js';

export type InitSystem = 'systemd' | 'upstart' | 'systemv' | 'unknown';

export type ServiceAction = 'start' | 'stop' | 'restart';

export interface ServiceStatus {
    running: boolean;
    /** Init system's own description of the state, e.g. "active" */
    state: string;
}

export interface ServiceSupervisor {
    initSystem(): Promise<InitSystem>;
    control(action: ServiceAction): Promise<void>;
    status(): Promise<ServiceStatus>;
    /** Installs and enables the agent, pointing it at the given config file */
    install(configFile?: string): Promise<void>;
    uninstall(): Promise<void>;
}

export const SERVICE_NAME = 'volctl';

/**
 * Marker paths checked in order
 */
const INIT_SYSTEM_MARKERS: ReadonlyArray<[string, InitSystem]> = [
    ['/run/systemd/system', 'systemd'],
    ['/sbin/initctl', 'upstart'],
    ['/etc/init.d', 'systemv'],
];

export interface SystemdSupervisorOptions {
    run?: CommandRunner;
    /** Resolves true when the path exists */
    exists?: (path: string) => Promise<boolean>;
    unitDir?: string;
    /** Storage agent started by the unit */
    agentPath?: string;
}

async function pathExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

export function renderUnitFile(agentPath: string, configFile?: string): string {
    const execStart = configFile ? `${agentPath} --config ${configFile}` : agentPath;
    return [
        '[Unit]',
        'Description=volctl storage agent',
        'Wants=network-online.target',
        'After=network-online.target',
        '',
        '[Service]',
        'Type=simple',
        `ExecStart=${execStart}`,
        'Restart=on-failure',
        '',
        '[Install]',
        'WantedBy=multi-user.target',
        '',
    ].join('\n');
}

export class SystemdSupervisor implements ServiceSupervisor {
    private readonly run: CommandRunner;
    private readonly exists: (path: string) => Promise<boolean>;
    private readonly unitDir: string;
    private readonly agentPath: string;

    constructor(options: SystemdSupervisorOptions = {}) {
        this.run = options.run ?? runCommand;
        this.exists = options.exists ?? pathExists;
        this.unitDir = options.unitDir ?? '/etc/systemd/system';
        this.agentPath = options.agentPath ?? '/usr/local/bin/volctl-agent';
    }

    get unitPath(): string {
        return join(this.unitDir, `${SERVICE_NAME}.service`);
    }

    async initSystem(): Promise<InitSystem> {
        for (const [marker, system] of INIT_SYSTEM_MARKERS) {
            if (await this.exists(marker)) {
                return system;
            }
        }
        return 'unknown';
    }

    async control(action: ServiceAction): Promise<void> {
        await this.requireSystemd();
        await this.systemctl(action, SERVICE_NAME);
    }

    async status(): Promise<ServiceStatus> {
        await this.requireSystemd();
        // is-active exits non-zero for every state except "active"
        const result = await this.run('systemctl', ['is-active', SERVICE_NAME]);
        const state = result.stdout.trim() || 'unknown';
        return { running: result.exitCode === 0 && state === 'active', state };
    }

    async install(configFile?: string): Promise<void> {
        await this.requireSystemd();
        await writeFile(this.unitPath, renderUnitFile(this.agentPath, configFile), 'utf8');
        await this.systemctl('daemon-reload');
        await this.systemctl('enable', SERVICE_NAME);
    }

    async uninstall(): Promise<void> {
        await this.requireSystemd();
        if (await this.exists(this.unitPath)) {
            await this.systemctl('disable', SERVICE_NAME);
            await rm(this.unitPath, { force: true });
        }
        await this.systemctl('daemon-reload');
    }

    private async requireSystemd(): Promise<void> {
        const system = await this.initSystem();
        if (system !== 'systemd') {
            throw new ServiceError(`unsupported init system: ${system}`, {
                suggestion: 'Manage the volctl agent with your init system directly',
            });
        }
    }

    private async systemctl(...args: string[]): Promise<void> {
        const result = await this.run('systemctl', args);
        if (result.exitCode !== 0) {
            const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
            throw new ServiceError(`systemctl ${args.join(' ')} failed: ${detail}`);
        }
    }
}
