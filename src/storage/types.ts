/**
 * Storage Service Types
 *
 * Shared type definitions for storage service API interactions.
 * These types define the contract between the CLI and the storage service.
 */

/**
 * Volume attachment to an instance
 */
export interface VolumeAttachment {
    instanceID: string;
    deviceName?: string;
    mountPoint?: string;
    status?: string;
}

export interface Volume {
    id: string;
    name: string;
    size?: number;
    iops?: number;
    type?: string;
    availabilityZone?: string;
    encrypted?: boolean;
    status?: string;
    attachments?: VolumeAttachment[];
}

export interface Snapshot {
    id: string;
    name: string;
    volumeID: string;
    volumeSize?: number;
    startTime?: number;
    status?: string;
    encrypted?: boolean;
}

/**
 * Block device as seen by the storage executor on this host
 */
export interface Device {
    name: string;
    volumeID?: string;
    mountPoint?: string;
    fsType?: string;
}

/**
 * Registered storage driver type
 */
export interface AdapterType {
    name: string;
    description?: string;
}

export interface AdapterInstance {
    name: string;
    driver: string;
    service: string;
}

export interface ModuleType {
    name: string;
    description?: string;
}

export interface ModuleInstance {
    id: number;
    name: string;
    typeName: string;
    address: string;
    isStarted: boolean;
}

export interface CreateVolumeRequest {
    name: string;
    size?: number;
    iops?: number;
    type?: string;
    availabilityZone?: string;
    encrypted?: boolean;
    encryptionKey?: string;
    idempotent?: boolean;
}

export interface AttachVolumeRequest {
    force?: boolean;
    encryptionKey?: string;
    idempotent?: boolean;
}

export interface MountVolumeRequest {
    fsType?: string;
    overwriteFs?: boolean;
    encryptionKey?: string;
    idempotent?: boolean;
}

export interface CreateSnapshotRequest {
    volumeID: string;
    name?: string;
    idempotent?: boolean;
}

export interface CopySnapshotRequest {
    name?: string;
    region?: string;
}

export interface MountDeviceRequest {
    mountPoint: string;
    mountOptions?: string;
    mountLabel?: string;
}

export interface FormatDeviceRequest {
    fsType: string;
    overwriteFs?: boolean;
}

export interface CreateModuleInstanceRequest {
    typeName: string;
    name: string;
    address: string;
    start?: boolean;
    config?: string;
}
