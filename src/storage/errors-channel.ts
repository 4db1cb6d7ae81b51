/**
 * Asynchronous error stream produced by client activation.
 *
 * Work submitted in async mode is tracked here; its failures are queued for
 * the runner, which stops the channel and drains it before the process
 * exits. Iteration ends once the channel is stopped and every tracked task
 * has settled.
 */

import { toError } from '../core/errors.js';

export interface ErrorStream extends AsyncIterable<Error> {
    /** Registers background work whose failure should be reported */
    track(task: Promise<unknown>): void;
    /** Accepts no new work; iteration ends when pending work settles */
    stop(): void;
}

export class ErrorChannel implements ErrorStream {
    private readonly queue: Error[] = [];
    private readonly waiters: Array<(result: IteratorResult<Error>) => void> = [];
    private readonly pending = new Set<Promise<void>>();
    private stopped = false;

    get pendingCount(): number {
        return this.pending.size;
    }

    push(error: Error): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: error, done: false });
        } else {
            this.queue.push(error);
        }
    }

    track(task: Promise<unknown>): void {
        if (this.stopped) {
            throw new Error('error channel is stopped');
        }
        const tracked: Promise<void> = task
            .then(
                () => undefined,
                (error: unknown) => this.push(toError(error))
            )
            .finally(() => {
                this.pending.delete(tracked);
                this.closeIfIdle();
            });
        this.pending.add(tracked);
    }

    stop(): void {
        this.stopped = true;
        this.closeIfIdle();
    }

    private get closed(): boolean {
        return this.stopped && this.pending.size === 0;
    }

    private closeIfIdle(): void {
        if (!this.closed) {
            return;
        }
        for (const waiter of this.waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<Error> {
        return {
            next: (): Promise<IteratorResult<Error>> => {
                const error = this.queue.shift();
                if (error) {
                    return Promise.resolve({ value: error, done: false });
                }
                if (this.closed) {
                    return Promise.resolve({ value: undefined, done: true });
                }
                return new Promise(resolve => this.waiters.push(resolve));
            },
        };
    }
}
