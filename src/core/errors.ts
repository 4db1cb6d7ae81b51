/**
 * volctl Error Hierarchy
 *
 * Hierarchy:
 *   VolctlError (base)
 *   ├── ConfigLoadError (config file present but unreadable or invalid; fatal)
 *   ├── PermissionDeniedError (command needs a privilege the caller lacks)
 *   ├── ClientActivationError (storage client could not be activated)
 *   ├── FlagParseError (malformed command-line input)
 *   ├── UsageError (arguments a command cannot work with)
 *   ├── StorageRequestError (storage service rejected a request)
 *   └── ServiceError (init system refused a service operation)
 *
 * Recoverable errors are rendered where they are detected and then turned
 * into a control signal; ConfigLoadError is never converted.
 */

export interface VolctlErrorOptions {
    suggestion?: string;
    cause?: unknown;
}

/**
 * Base error class for all volctl errors
 */
export class VolctlError extends Error {
    /** Error code for programmatic handling */
    readonly code: string;

    /** Suggestion for how to fix the error */
    readonly suggestion?: string;

    constructor(message: string, code: string, options: VolctlErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = 'VolctlError';
        this.code = code;
        this.suggestion = options.suggestion;
    }
}

/**
 * Thrown when a config file exists but cannot be read or fails validation
 */
export class ConfigLoadError extends VolctlError {
    readonly path: string;

    constructor(path: string, reason: string, cause?: unknown) {
        super(`Invalid config file ${path}: ${reason}`, 'CONFIG_LOAD', {
            suggestion: 'Fix the file or point --config at another one',
            cause,
        });
        this.name = 'ConfigLoadError';
        this.path = path;
    }
}

/**
 * Thrown when the resolved command requires elevated privilege
 */
export class PermissionDeniedError extends VolctlError {
    readonly operation: string;

    constructor(operation: string) {
        super(`volctl can only be ${operation} by root`, 'PERMISSION_DENIED', {
            suggestion: 'Re-run the command with elevated privileges',
        });
        this.name = 'PermissionDeniedError';
        this.operation = operation;
    }
}

export class ClientActivationError extends VolctlError {
    constructor(message: string, options: VolctlErrorOptions = {}) {
        super(message, 'CLIENT_ACTIVATION', options);
        this.name = 'ClientActivationError';
    }
}

/**
 * Thrown by command resolution when flags do not parse for the matched command
 */
export class FlagParseError extends VolctlError {
    /** Path of the command whose flags failed to parse */
    readonly commandPath: readonly string[];

    constructor(message: string, commandPath: readonly string[], cause?: unknown) {
        super(message, 'FLAG_PARSE', { cause });
        this.name = 'FlagParseError';
        this.commandPath = commandPath;
    }
}

export class UsageError extends VolctlError {
    constructor(message: string) {
        super(message, 'USAGE');
        this.name = 'UsageError';
    }
}

export class StorageRequestError extends VolctlError {
    readonly status: number;

    constructor(message: string, status: number) {
        super(message, 'STORAGE_REQUEST');
        this.name = 'StorageRequestError';
        this.status = status;
    }
}

export class ServiceError extends VolctlError {
    constructor(message: string, options: VolctlErrorOptions = {}) {
        super(message, 'SERVICE', options);
        this.name = 'ServiceError';
    }
}

export function isVolctlError(error: unknown): error is VolctlError {
    return error instanceof VolctlError;
}

/**
 * Normalizes a thrown value into an Error
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(typeof value === 'string' ? value : String(value));
}
