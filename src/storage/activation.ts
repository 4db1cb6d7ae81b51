/**
 * Storage client activation.
 *
 * Activation checks the storage settings in the ConfigStore, returns the
 * (possibly refreshed) store and context together with the error stream the
 * runner must drain, and then builds the client.
 */

import { ConfigKeys, type ConfigStore } from '../config.js';
import { ContextKeys, type RequestContext } from '../core/context.js';
import { ClientActivationError } from '../core/errors.js';
import { createStorageClient, type StorageClient } from './client.js';
import { ErrorChannel, type ErrorStream } from './errors-channel.js';

export interface Activation {
    config: ConfigStore;
    context: RequestContext;
    errors: ErrorStream;
}

export interface ClientActivator {
    activate(context: RequestContext, config: ConfigStore): Promise<Activation>;
    createClient(activation: Activation): Promise<StorageClient>;
}

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Parses storage.host; tcp:// is accepted as an alias of http://
 */
export function parseStorageHost(host: string): URL {
    const trimmed = host.trim();
    if (!trimmed) {
        throw new ClientActivationError('storage host is not configured', {
            suggestion: 'Set storage.host in the config file or pass --host',
        });
    }

    let url: URL;
    try {
        url = new URL(trimmed.replace(/^tcp:\/\//, 'http://'));
    } catch (error) {
        throw new ClientActivationError(`invalid storage host "${trimmed}"`, { cause: error });
    }

    if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
        throw new ClientActivationError(`unsupported storage host protocol "${url.protocol}"`);
    }
    return url;
}

/**
 * Activates the HTTP storage client
 */
export const httpActivator: ClientActivator = {
    async activate(context, config) {
        const url = parseStorageHost(config.getString(ConfigKeys.storageHost));
        return {
            config,
            context: context.withValue(ContextKeys.storageHost, url.toString().replace(/\/+$/, '')),
            errors: new ErrorChannel(),
        };
    },

    async createClient({ config, context, errors }) {
        const apiUrl = context.string(ContextKeys.storageHost);
        if (!apiUrl) {
            throw new ClientActivationError('storage client was not activated');
        }
        return createStorageClient({
            apiUrl,
            service: config.getString(ConfigKeys.storageService) || undefined,
            timeoutMs: config.getDuration(ConfigKeys.storageTimeout) || undefined,
            async: context.flag(ContextKeys.async),
            errors,
        });
    },
};
