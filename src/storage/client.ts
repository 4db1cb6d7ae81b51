/**
 * Storage Service API Client
 *
 * Handles all communication with the remote storage service.
 *
 * Features:
 * - Service name injection on every request
 * - Per-request timeout
 * - Async mode: mutating calls are handed to the error channel and return
 *   immediately, their failures surface when the runner drains the channel
 */

import { isRecord } from '../config.js';
import { StorageRequestError } from '../core/errors.js';
import type { ErrorStream } from './errors-channel.js';
import type {
    AdapterInstance,
    AdapterType,
    AttachVolumeRequest,
    CopySnapshotRequest,
    CreateModuleInstanceRequest,
    CreateSnapshotRequest,
    CreateVolumeRequest,
    Device,
    FormatDeviceRequest,
    ModuleInstance,
    ModuleType,
    MountDeviceRequest,
    MountVolumeRequest,
    Snapshot,
    Volume,
} from './types.js';

/** Header naming the storage service a request is addressed to */
export const SERVICE_HEADER = 'X-Volctl-Service';

/**
 * API client configuration
 */
export interface StorageClientConfig {
    apiUrl: string;
    service?: string;
    timeoutMs?: number;
    /** Submit mutating calls in the background */
    async?: boolean;
    /** Required when async is set */
    errors?: ErrorStream;
}

export interface VolumeFilter {
    attached?: boolean;
    available?: boolean;
}

export type StorageClient = ReturnType<typeof createStorageClient>;

function parseErrorMessage(text: string): string | undefined {
    try {
        const body: unknown = JSON.parse(text);
        return isRecord(body) && typeof body.message === 'string' && body.message ? body.message : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Creates a storage API client instance
 */
export function createStorageClient(config: StorageClientConfig) {
    const apiUrl = config.apiUrl.replace(/\/+$/, '');
    const { errors } = config;

    if (config.async && !errors) {
        throw new Error('async storage client requires an error stream');
    }

    function headers(): Record<string, string> {
        const result: Record<string, string> = {
            'Content-Type': 'application/json',
        };
        if (config.service) {
            result[SERVICE_HEADER] = config.service;
        }
        return result;
    }

    /**
     * Sends a request and rejects on a non-2xx response
     */
    async function send(method: string, path: string, body?: unknown): Promise<Response> {
        const url = `${apiUrl}${path}`;

        const response = await fetch(url, {
            method,
            headers: headers(),
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: config.timeoutMs ? AbortSignal.timeout(config.timeoutMs) : undefined,
        });

        if (!response.ok) {
            const message = parseErrorMessage(await response.text());
            throw new StorageRequestError(message ?? `storage service error: ${response.status}`, response.status);
        }
        return response;
    }

    /**
     * Makes an API request and decodes the JSON response
     */
    async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
        const response = await send(method, path, body);
        return response.json() as Promise<T>;
    }

    /**
     * Runs a mutating call, in the background when async mode is on
     */
    async function mutate<T>(pending: Promise<T>): Promise<T | undefined> {
        if (config.async && errors) {
            errors.track(pending);
            return undefined;
        }
        return pending;
    }

    const id = encodeURIComponent;

    return {
        get isAsync(): boolean {
            return config.async === true;
        },

        async listAdapterTypes(): Promise<AdapterType[]> {
            return request<AdapterType[]>('GET', '/drivers');
        },

        async listAdapterInstances(): Promise<AdapterInstance[]> {
            return request<AdapterInstance[]>('GET', '/services');
        },

        async listModuleTypes(): Promise<ModuleType[]> {
            return request<ModuleType[]>('GET', '/modules/types');
        },

        async listModuleInstances(): Promise<ModuleInstance[]> {
            return request<ModuleInstance[]>('GET', '/modules/instances');
        },

        async createModuleInstance(body: CreateModuleInstanceRequest): Promise<ModuleInstance | undefined> {
            return mutate(request<ModuleInstance>('POST', '/modules/instances', body));
        },

        async startModuleInstance(name: string): Promise<ModuleInstance | undefined> {
            return mutate(request<ModuleInstance>('POST', `/modules/instances/${id(name)}/start`));
        },

        /**
         * Lists volumes, optionally narrowed to attached or available ones
         */
        async listVolumes(filter: VolumeFilter = {}): Promise<Volume[]> {
            const query = new URLSearchParams();
            if (filter.attached) query.set('attached', 'true');
            if (filter.available) query.set('available', 'true');
            const search = query.toString();
            return request<Volume[]>('GET', search ? `/volumes?${search}` : '/volumes');
        },

        async inspectVolume(volumeID: string): Promise<Volume> {
            return request<Volume>('GET', `/volumes/${id(volumeID)}`);
        },

        async createVolume(body: CreateVolumeRequest): Promise<Volume | undefined> {
            return mutate(request<Volume>('POST', '/volumes', body));
        },

        async removeVolume(volumeID: string, force = false): Promise<void> {
            await mutate(send('DELETE', `/volumes/${id(volumeID)}${force ? '?force=true' : ''}`));
        },

        async attachVolume(volumeID: string, body: AttachVolumeRequest = {}): Promise<Volume | undefined> {
            return mutate(request<Volume>('POST', `/volumes/${id(volumeID)}/attach`, body));
        },

        async detachVolume(volumeID: string, force = false): Promise<Volume | undefined> {
            return mutate(request<Volume>('POST', `/volumes/${id(volumeID)}/detach`, { force }));
        },

        async mountVolume(volumeID: string, body: MountVolumeRequest = {}): Promise<{ path: string } | undefined> {
            return mutate(request<{ path: string }>('POST', `/volumes/${id(volumeID)}/mount`, body));
        },

        async unmountVolume(volumeID: string): Promise<void> {
            await mutate(send('POST', `/volumes/${id(volumeID)}/unmount`));
        },

        async volumePath(volumeID: string): Promise<{ path: string }> {
            return request<{ path: string }>('GET', `/volumes/${id(volumeID)}/path`);
        },

        async listSnapshots(): Promise<Snapshot[]> {
            return request<Snapshot[]>('GET', '/snapshots');
        },

        async createSnapshot(body: CreateSnapshotRequest): Promise<Snapshot | undefined> {
            return mutate(request<Snapshot>('POST', `/volumes/${id(body.volumeID)}/snapshots`, body));
        },

        async removeSnapshot(snapshotID: string): Promise<void> {
            await mutate(send('DELETE', `/snapshots/${id(snapshotID)}`));
        },

        async copySnapshot(snapshotID: string, body: CopySnapshotRequest = {}): Promise<Snapshot | undefined> {
            return mutate(request<Snapshot>('POST', `/snapshots/${id(snapshotID)}/copy`, body));
        },

        async listDevices(): Promise<Device[]> {
            return request<Device[]>('GET', '/devices');
        },

        async mountDevice(deviceName: string, body: MountDeviceRequest): Promise<Device | undefined> {
            return mutate(request<Device>('POST', `/devices/${id(deviceName)}/mount`, body));
        },

        async unmountDevice(mountPoint: string): Promise<void> {
            await mutate(send('POST', '/devices/unmount', { mountPoint }));
        },

        async formatDevice(deviceName: string, body: FormatDeviceRequest): Promise<Device | undefined> {
            return mutate(request<Device>('POST', `/devices/${id(deviceName)}/format`, body));
        },
    };
}
