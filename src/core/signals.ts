/**
 * Control Signals
 *
 * Structured non-local exits. Lifecycle steps and command actions return a
 * signal instead of throwing; every layer passes it up untouched and the
 * runner consumes it exactly once to pick the process exit code.
 */

export type ControlSignal =
    | { kind: 'help-requested' }
    | { kind: 'subcommand-handled' }
    | { kind: 'reported-error'; error: Error }
    | { kind: 'exit-with-code'; code: number };

export type ControlSignalKind = ControlSignal['kind'];

export const helpRequested = (): ControlSignal => ({ kind: 'help-requested' });

export const subcommandHandled = (): ControlSignal => ({ kind: 'subcommand-handled' });

/**
 * The error has already been shown to the user; only the exit code remains.
 */
export const reportedError = (error: Error): ControlSignal => ({ kind: 'reported-error', error });

export const exitWithCode = (code: number): ControlSignal => ({ kind: 'exit-with-code', code });

/**
 * Maps a signal (or its absence) to the process exit code
 */
export function exitCodeFor(signal: ControlSignal | undefined): number {
    if (!signal) {
        return 0;
    }
    switch (signal.kind) {
        case 'help-requested':
        case 'subcommand-handled':
            return 0;
        case 'reported-error':
            return 1;
        case 'exit-with-code':
            return signal.code;
    }
}
