/**
 * Terminal output helpers.
 *
 * Commands never touch process.stdout directly: they write through an Io
 * so tests can capture output and colour can follow the terminal probe.
 */

import pc from 'picocolors';

export type Palette = ReturnType<typeof pc.createColors>;

export interface Io {
    /** Writes text to standard output as-is */
    out(text: string): void;
    /** Writes text to standard error as-is */
    err(text: string): void;
    /** Whether standard error is attached to a terminal */
    readonly isTerminal: boolean;
}

/**
 * Io bound to the current process streams
 */
export function processIo(): Io {
    return {
        out: text => {
            process.stdout.write(text);
        },
        err: text => {
            process.stderr.write(text);
        },
        isTerminal: process.stderr.isTTY === true,
    };
}

export function paletteFor(enabled: boolean): Palette {
    return pc.createColors(enabled);
}

export function println(io: Io, text = ''): void {
    io.out(`${text}\n`);
}

export function success(io: Io, message: string): void {
    const colors = paletteFor(io.isTerminal);
    println(io, `${colors.green('✓')} ${message}`);
}

export function info(io: Io, message: string): void {
    const colors = paletteFor(io.isTerminal);
    println(io, `${colors.blue('ℹ')} ${message}`);
}
