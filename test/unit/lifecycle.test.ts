import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { asyncFlag, rootFlags } from '../../src/cli/flags.js';
import {
    bindFlags,
    createLifecycle,
    runLifecycle,
    type LifecycleDeps,
    type LifecycleStep,
    type LifecycleStepName,
} from '../../src/cli/lifecycle.js';
import { createPermissionGate, type PermissionGate } from '../../src/cli/permissions.js';
import { ErrorPresenter, formatError } from '../../src/cli/presenter.js';
import { CommanderTree } from '../../src/cli/tree.js';
import { ConfigKeys, type ConfigStore } from '../../src/config.js';
import { schemaValidator, type ConfigValidator } from '../../src/core/config-schema.js';
import { ContextKeys, type RequestContext } from '../../src/core/context.js';
import { ClientActivationError, ConfigLoadError, PermissionDeniedError } from '../../src/core/errors.js';
import { helpRequested, type ControlSignal } from '../../src/core/signals.js';
import { createInvocationState } from '../../src/core/state.js';
import type { ClientActivator } from '../../src/storage/activation.js';
import { createStorageClient } from '../../src/storage/client.js';
import { ErrorChannel } from '../../src/storage/errors-channel.js';
import { bufferIo, captureLogger, createWorkDir, nodeAt, removeWorkDir } from '../helpers.js';

function createTree(): CommanderTree {
    const tree = new CommanderTree({ name: 'volctl', description: 'Test root', flags: rootFlags });
    tree.register([], { name: 'service', description: 'Manage the agent' });
    tree.register(['service'], { name: 'start', description: 'Start the agent', action: async () => undefined });
    tree.register([], { name: 'volume', description: 'Manage volumes' });
    tree.register(['volume'], {
        name: 'ls',
        description: 'List volumes',
        activateClient: true,
        flags: [asyncFlag],
        action: async () => undefined,
    });
    return tree;
}

function fakeActivator(): ClientActivator {
    return {
        activate: vi.fn(async (context: RequestContext, config: ConfigStore) => ({
            context,
            config,
            errors: new ErrorChannel(),
        })),
        createClient: vi.fn(async () => createStorageClient({ apiUrl: 'http://storage.test' })),
    };
}

describe('Lifecycle', () => {
    let workDir: string;
    let missingConfig: string;

    beforeEach(async () => {
        workDir = await createWorkDir();
        missingConfig = join(workDir, 'missing.yml');
    });

    afterEach(async () => {
        await removeWorkDir(workDir);
    });

    function setup(argv: string[], overrides: Partial<LifecycleDeps> = {}, env: NodeJS.ProcessEnv = {}) {
        const tree = createTree();
        const io = bufferIo();
        const { logger, records } = captureLogger();
        const state = createInvocationState({
            io,
            logger,
            env: { VOLCTL_CONFIG_FILE: missingConfig, ...env },
        });
        const deps: LifecycleDeps = {
            tree,
            validator: schemaValidator,
            gate: createPermissionGate(),
            activator: fakeActivator(),
            presenter: new ErrorPresenter(io),
            ...overrides,
        };
        const command = tree.resolve(argv);
        bindFlags(state, command);
        const run = () => runLifecycle(createLifecycle(deps), { state, command });
        return { tree, io, records, state, deps, command, run };
    }

    describe('runLifecycle', () => {
        it('should run the steps in their fixed order', () => {
            const { deps } = setup(['service', 'start']);
            expect(createLifecycle(deps).map(step => step.name)).toEqual([
                'load-config',
                'apply-log-level',
                'apply-overrides',
                'help',
                'check-permissions',
                'activate-client',
            ]);
        });

        it('should stop at the first step that returns a signal', async () => {
            const { state, command } = setup(['service', 'start']);
            const calls: LifecycleStepName[] = [];
            const step = (name: LifecycleStepName, signal?: ControlSignal): LifecycleStep => ({
                name,
                run: async () => {
                    calls.push(name);
                    return signal;
                },
            });

            const signal = await runLifecycle(
                [step('load-config'), step('apply-log-level', helpRequested()), step('apply-overrides')],
                { state, command }
            );

            expect(signal).toEqual({ kind: 'help-requested' });
            expect(calls).toEqual(['load-config', 'apply-log-level']);
        });

        it('should return undefined when every step passes', async () => {
            const { run } = setup(['service', 'start']);
            await expect(run()).resolves.toBeUndefined();
        });
    });

    describe('load-config', () => {
        it('should skip a config file that does not exist', async () => {
            const validator: ConfigValidator = { validate: vi.fn(async () => undefined) };
            const { run, state } = setup(['service', 'start'], { validator });

            await expect(run()).resolves.toBeUndefined();
            expect(validator.validate).not.toHaveBeenCalled();
            expect(state.configFile).toBeUndefined();
        });

        it('should let flags win over values from the loaded file', async () => {
            const path = join(workDir, 'config.yml');
            await writeFile(path, 'volctl:\n  logLevel: error\n  cli:\n    format: jsonp\n    quiet: true\n');
            const { run, state } = setup(['volume', 'ls', '--config', path, '--format', 'json']);

            await expect(run()).resolves.toBeUndefined();

            expect(state.config.lookup(ConfigKeys.format)).toEqual({ value: 'json', tier: 'flag' });
            expect(state.config.lookup(ConfigKeys.quiet)).toEqual({ value: true, tier: 'file' });
            expect(state.logger.level).toBe('error');
            expect(state.configFile).toBe(path);
            expect(state.env.VOLCTL_CONFIG_FILE).toBe(path);
        });

        it('should take the path from VOLCTL_CONFIG_FILE when no flag is given', async () => {
            const path = join(workDir, 'env.yml');
            await writeFile(path, 'storage:\n  timeout: 5s\n');
            const { run, state } = setup(['service', 'start'], {}, { VOLCTL_CONFIG_FILE: path });

            await run();
            expect(state.configFile).toBe(path);
            expect(state.config.getDuration(ConfigKeys.storageTimeout)).toBe(5000);
        });

        it('should abort with ConfigLoadError when the file is invalid', async () => {
            const path = join(workDir, 'config.yml');
            await writeFile(path, 'volctl:\n  cli:\n    format: xml\n');
            const { run, io } = setup(['service', 'start', '-c', path]);

            await expect(run()).rejects.toBeInstanceOf(ConfigLoadError);
            expect(io.stdout).toBe('');
        });
    });

    describe('apply-log-level', () => {
        it('should apply and publish a known level', async () => {
            const { run, state } = setup(['service', 'start', '-l', 'DEBUG']);
            await run();
            expect(state.logger.level).toBe('debug');
            expect(state.config.get(ConfigKeys.logLevel)).toBe('debug');
            expect(state.context.string(ContextKeys.logLevel)).toBe('debug');
        });

        it('should ignore an unknown level', async () => {
            const { run, state } = setup(['service', 'start', '-l', 'loud']);
            await run();
            expect(state.logger.level).toBe('trace');
            expect(state.config.get(ConfigKeys.logLevel)).toBe('loud');
            expect(state.context.value(ContextKeys.logLevel)).toBeUndefined();
        });
    });

    describe('apply-overrides', () => {
        it('should disable the path cache', async () => {
            const { run, state } = setup(['service', 'start']);
            await run();
            expect(state.config.getBool(ConfigKeys.pathCacheEnabled)).toBe(false);
        });

        it('should copy host and service overrides above env values', async () => {
            const { run, state } = setup(['service', 'start', '--host', 'http://flag.test', '-s', 'ebs'], {}, {
                STORAGE_HOST: 'http://env.test',
            });
            await run();
            expect(state.config.get(ConfigKeys.storageHost)).toBe('http://flag.test');
            expect(state.config.get(ConfigKeys.storageService)).toBe('ebs');
        });

        it('should not replace a value already held by a flag', async () => {
            const { run, state } = setup(['service', 'start'], {}, { VOLCTL_HOST: 'http://env.test' });
            state.config.set(ConfigKeys.storageHost, 'http://explicit.test');
            await run();
            expect(state.config.get(ConfigKeys.storageHost)).toBe('http://explicit.test');
        });
    });

    describe('help', () => {
        it('should print help and stop before the permission check', async () => {
            const gate: PermissionGate = { check: vi.fn(() => new PermissionDeniedError('started')) };
            const { run, io, tree } = setup(['service', 'start', '--help'], { gate });

            await expect(run()).resolves.toEqual({ kind: 'help-requested' });
            expect(gate.check).not.toHaveBeenCalled();
            expect(io.stdout).toBe(tree.helpText(nodeAt(tree, ['service', 'start'])));
            expect(io.stderr).toBe('');
        });

        it('should treat --verbose as a help request', async () => {
            const { run } = setup(['service', 'start', '--verbose']);
            await expect(run()).resolves.toEqual({ kind: 'help-requested' });
        });
    });

    describe('check-permissions', () => {
        it('should render the denial followed by help', async () => {
            const activator = fakeActivator();
            const { run, io, tree } = setup(['service', 'start'], {
                gate: createPermissionGate(() => false),
                activator,
            });

            const signal = await run();

            expect(signal?.kind).toBe('reported-error');
            expect(io.stderr).toBe(formatError(new PermissionDeniedError('started'), false));
            expect(io.stdout).toBe(`\n${tree.helpText(nodeAt(tree, ['service', 'start']))}`);
            expect(activator.activate).not.toHaveBeenCalled();
        });
    });

    describe('activate-client', () => {
        it('should activate the client for marked commands', async () => {
            const { run, state, deps } = setup(['volume', 'ls']);

            await expect(run()).resolves.toBeUndefined();
            expect(deps.activator.activate).toHaveBeenCalledTimes(1);
            expect(state.client?.isAsync).toBe(false);
            expect(state.errors).toBeInstanceOf(ErrorChannel);
        });

        it('should carry --async into the request context', async () => {
            const activator = fakeActivator();
            const { run } = setup(['volume', 'ls', '--async'], { activator });

            await run();
            const [context] = vi.mocked(activator.activate).mock.calls[0];
            expect(context.flag(ContextKeys.async)).toBe(true);
        });

        it('should skip commands that do not need a client', async () => {
            const { run, state, deps } = setup(['service', 'start']);
            await run();
            expect(deps.activator.activate).not.toHaveBeenCalled();
            expect(state.client).toBeUndefined();
        });

        it('should render activation failures followed by help', async () => {
            const activator = fakeActivator();
            vi.mocked(activator.activate).mockRejectedValue(new Error('connection refused'));
            const { run, io, tree, state } = setup(['volume', 'ls'], { activator });

            const signal = await run();

            if (signal?.kind !== 'reported-error') {
                throw new Error('expected a reported error');
            }
            expect(signal.error).toBeInstanceOf(ClientActivationError);
            expect(signal.error.message).toBe('connection refused');
            expect(io.stderr).toBe(formatError(signal.error, false));
            expect(io.stdout).toBe(`\n${tree.helpText(nodeAt(tree, ['volume', 'ls']))}`);
            expect(state.client).toBeUndefined();
        });
    });
});
