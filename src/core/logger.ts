import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export type { Level, Logger };

export const DEFAULT_LOG_LEVEL: Level = 'warn';

const LEVEL_ALIASES = new Map<string, Level>([
    ['trace', 'trace'],
    ['debug', 'debug'],
    ['info', 'info'],
    ['warn', 'warn'],
    ['warning', 'warn'],
    ['error', 'error'],
    ['fatal', 'fatal'],
    ['panic', 'fatal'],
]);

export interface LoggerOptions {
    level?: Level;
    /** Defaults to a synchronous stderr stream so logs never mix with command output */
    destination?: DestinationStream;
}

/**
 * Creates the logger for one invocation
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    return pino(
        {
            name: 'volctl',
            level: options.level ?? DEFAULT_LOG_LEVEL,
        },
        options.destination ?? pino.destination({ dest: 2, sync: true })
    );
}

/**
 * Parses a user-supplied level name; undefined when it is not a known level
 */
export function parseLogLevel(value: unknown): Level | undefined {
    if (typeof value !== 'string') {
        return undefined;
    }
    return LEVEL_ALIASES.get(value.trim().toLowerCase());
}
