import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type Level, type Logger } from '../src/core/logger.js';
import { isRecord } from '../src/config.js';
import type { CommandNode, CommandTree } from '../src/cli/tree.js';
import type { Io } from '../src/utils/ui.js';

/**
 * Io that keeps everything written to it
 */
export interface BufferedIo extends Io {
    stdout: string;
    stderr: string;
}

export function bufferIo(isTerminal = false): BufferedIo {
    const io: BufferedIo = {
        stdout: '',
        stderr: '',
        isTerminal,
        out(text) {
            io.stdout += text;
        },
        err(text) {
            io.stderr += text;
        },
    };
    return io;
}

export type LogRecord = Record<string, unknown>;

export interface CapturedLogger {
    logger: Logger;
    records: LogRecord[];
}

/**
 * Logger whose JSON lines are parsed into records
 */
export function captureLogger(level: Level = 'trace'): CapturedLogger {
    const records: LogRecord[] = [];
    const logger = createLogger({
        level,
        destination: {
            write(line: string) {
                const record: unknown = JSON.parse(line);
                if (isRecord(record)) {
                    records.push(record);
                }
            },
        },
    });
    return { logger, records };
}

/** pino's numeric levels */
export const LEVELS = { debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;

export function nodeAt(tree: CommandTree, path: readonly string[]): CommandNode {
    const node = tree.find(path);
    if (!node) {
        throw new Error(`no command at "${path.join(' ')}"`);
    }
    return node;
}

export const stripAnsi = (text: string): string => text.replace(/\x1b\[\d+m/g, '');

export async function createWorkDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'volctl-test-'));
}

export async function removeWorkDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}
