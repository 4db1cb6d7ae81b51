import { createConfigStore, type ConfigStore } from '../config.js';
import type { StorageClient } from '../storage/client.js';
import type { ErrorStream } from '../storage/errors-channel.js';
import { processIo, type Io } from '../utils/ui.js';
import { RequestContext } from './context.js';
import { createLogger, type Logger } from './logger.js';

export type FlagValue = string | number | boolean;

export type FlagValues = Record<string, FlagValue>;

/**
 * Mutable record of one process run. The runner creates it once and hands
 * it by reference to command resolution, every lifecycle step and the
 * resolved command's action.
 */
export interface InvocationState {
    flags: FlagValues;
    config: ConfigStore;
    logger: Logger;
    context: RequestContext;
    io: Io;
    /** Environment the run observes; receives VOLCTL_CONFIG_FILE after a load */
    env: NodeJS.ProcessEnv;
    /** Config file that was loaded, if any */
    configFile?: string;
    client?: StorageClient;
    /** Set once activation succeeds; drained by the runner before exit */
    errors?: ErrorStream;
}

export interface InvocationStateOptions {
    io?: Io;
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
}

export function createInvocationState(options: InvocationStateOptions = {}): InvocationState {
    const env = options.env ?? process.env;
    return {
        flags: {},
        config: createConfigStore(env),
        logger: options.logger ?? createLogger(),
        context: RequestContext.background(),
        io: options.io ?? processIo(),
        env,
    };
}

export function stringFlag(flags: FlagValues, name: string): string | undefined {
    const value = flags[name];
    return typeof value === 'string' ? value : undefined;
}

export function boolFlag(flags: FlagValues, name: string): boolean {
    return flags[name] === true;
}

export function intFlag(flags: FlagValues, name: string): number | undefined {
    const value = flags[name];
    return typeof value === 'number' ? value : undefined;
}
