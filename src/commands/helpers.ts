/**
 * Helpers shared by command actions
 */

import type { ActionContext } from '../cli/tree.js';
import { outputOptions, renderOutput, type Column } from '../cli/output.js';
import { ConfigKeys } from '../config.js';
import { UsageError, toError } from '../core/errors.js';
import { reportedError, type ControlSignal } from '../core/signals.js';
import type { InvocationState } from '../core/state.js';
import type { StorageClient } from '../storage/client.js';
import { info, println, success } from '../utils/ui.js';

/**
 * The activated storage client
 * @throws Error when the command was not registered with activateClient
 */
export function clientOf(state: InvocationState): StorageClient {
    if (!state.client) {
        throw new Error('storage client is not active');
    }
    return state.client;
}

/**
 * Renders a failure and reports it to the runner
 */
export function fail(ctx: ActionContext, error: Error): ControlSignal {
    ctx.presenter.render(error, ctx.state.io.isTerminal);
    return reportedError(error);
}

/**
 * Renders a usage problem followed by the command's help
 */
export function usageError(ctx: ActionContext, message: string): ControlSignal {
    const error = new UsageError(message);
    ctx.presenter.render(error, ctx.state.io.isTerminal);
    println(ctx.state.io);
    ctx.state.io.out(ctx.helpText());
    return reportedError(error);
}

export function printItems<T>(ctx: ActionContext, items: readonly T[], columns: readonly Column<T>[]): void {
    ctx.state.io.out(renderOutput(items, columns, outputOptions(ctx.state.config)));
}

/**
 * Runs a read-only request and prints its result
 */
export async function list<T>(
    ctx: ActionContext,
    fetchItems: (client: StorageClient) => Promise<T[]>,
    columns: readonly Column<T>[]
): Promise<ControlSignal | void> {
    let items: T[];
    try {
        items = await fetchItems(clientOf(ctx.state));
    } catch (error) {
        return fail(ctx, toError(error));
    }
    printItems(ctx, items, columns);
}

export interface BatchOperation<T> {
    /** Name of one target, used when none is given: "volumeID" */
    target: string;
    /** Used for dry runs: "remove volume" */
    action: string;
    /** Used on success when there is nothing to print: "removed volume" */
    done: string;
    /** Resolves nothing for operations without a result, or in async mode */
    run(target: string): Promise<T | void>;
    /** Results are printed with these columns when present */
    columns?: readonly Column<T>[];
}

/**
 * Applies an operation to each target in turn.
 *
 * A failure ends the batch unless continueOnError is set, in which case it
 * is logged and the next target processed. With dryRun the operations are
 * only described.
 */
export async function runBatch<T>(
    ctx: ActionContext,
    targets: readonly string[],
    operation: BatchOperation<T>
): Promise<ControlSignal | void> {
    const { state } = ctx;
    if (targets.length === 0) {
        return usageError(ctx, `at least one ${operation.target} is required`);
    }

    if (state.config.getBool(ConfigKeys.dryRun)) {
        for (const target of targets) {
            println(state.io, `dry run: would ${operation.action} ${target}`);
        }
        return;
    }

    const continueOnError = state.config.getBool(ConfigKeys.continueOnError);
    const submitted = state.client?.isAsync === true;
    const results: T[] = [];

    for (const target of targets) {
        try {
            const result = await operation.run(target);
            if (submitted) {
                info(state.io, `submitted: ${operation.action} ${target}`);
            } else if (operation.columns && result) {
                results.push(result);
            } else {
                success(state.io, `${operation.done} ${target}`);
            }
        } catch (error) {
            const failure = toError(error);
            if (!continueOnError) {
                return fail(ctx, failure);
            }
            state.logger.error({ err: failure, target }, `failed to ${operation.action}`);
        }
    }

    if (operation.columns && results.length > 0) {
        printItems(ctx, results, operation.columns);
    }
}
