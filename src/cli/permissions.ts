import { PermissionDeniedError } from '../core/errors.js';

/**
 * Commands that change the host and the verb used when refusing them
 */
export const SENSITIVE_OPERATIONS: ReadonlyMap<string, string> = new Map([
    ['install', 'installed'],
    ['uninstall', 'uninstalled'],
    ['service start', 'started'],
    ['service stop', 'stopped'],
    ['service restart', 'restarted'],
]);

/**
 * Decides whether a sensitive operation may run
 */
export type PrivilegePolicy = (operation: string) => boolean;

export const permitAll: PrivilegePolicy = () => true;

/**
 * Allows sensitive operations only for the root user
 */
export function requireRoot(geteuid: () => number = () => process.geteuid?.() ?? 0): PrivilegePolicy {
    return () => geteuid() === 0;
}

export interface PermissionGate {
    /** Undefined when the command may run */
    check(commandPath: readonly string[]): Error | undefined;
}

export function operationFor(commandPath: readonly string[]): string | undefined {
    return SENSITIVE_OPERATIONS.get(commandPath.join(' '));
}

export function createPermissionGate(policy: PrivilegePolicy = permitAll): PermissionGate {
    return {
        check(commandPath) {
            const operation = operationFor(commandPath);
            if (operation === undefined || policy(operation)) {
                return undefined;
            }
            return new PermissionDeniedError(operation);
        },
    };
}
