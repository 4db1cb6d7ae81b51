/**
 * Child process runner used to drive the host init system.
 *
 * Output is captured rather than inherited so callers can inspect it; the
 * promise resolves with the exit code and only rejects when the command
 * cannot be started at all.
 */

import { spawn, type ChildProcess } from 'node:child_process';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Exit codes reported for children killed by a signal
 */
const SIGNAL_EXIT_CODES: Record<string, number> = {
    SIGHUP: 129,
    SIGINT: 130,
    SIGTERM: 143,
};

export const runCommand: CommandRunner = (command, args) => {
    return new Promise((resolve, reject) => {
        const child: ChildProcess = spawn(command, [...args], {
            env: process.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';
        child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr?.setEncoding('utf8').on('data', (chunk: string) => {
            stderr += chunk;
        });

        // e.g. command not found
        child.on('error', error => {
            reject(new Error(`Failed to start command "${command}": ${error.message}`));
        });

        child.on('close', (code, signal) => {
            const exitCode = signal ? (SIGNAL_EXIT_CODES[signal] ?? 128) : (code ?? 0);
            resolve({ exitCode, stdout, stderr });
        });
    });
};
