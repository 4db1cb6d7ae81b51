/**
 * Request-scoped values carried through an invocation.
 *
 * Contexts are immutable; withValue returns a new context so a step can
 * hand a derived context on without affecting earlier holders.
 */

export const ContextKeys = {
    logLevel: 'logLevel',
    async: 'async',
    storageHost: 'storage.host',
} as const;

export type ContextKey = (typeof ContextKeys)[keyof typeof ContextKeys];

export class RequestContext {
    private readonly values: ReadonlyMap<string, unknown>;

    private constructor(values: ReadonlyMap<string, unknown>) {
        this.values = values;
    }

    static background(): RequestContext {
        return new RequestContext(new Map());
    }

    withValue(key: ContextKey, value: unknown): RequestContext {
        const next = new Map(this.values);
        next.set(key, value);
        return new RequestContext(next);
    }

    value(key: ContextKey): unknown {
        return this.values.get(key);
    }

    string(key: ContextKey): string | undefined {
        const value = this.values.get(key);
        return typeof value === 'string' ? value : undefined;
    }

    flag(key: ContextKey): boolean {
        return this.values.get(key) === true;
    }
}
