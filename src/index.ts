/**
 * volctl
 *
 * Storage management CLI. The runner, command tree and lifecycle are
 * exported so the CLI can be embedded and driven programmatically.
 *
 * @example
 * ```typescript
 * import { execute } from 'volctl';
 *
 * const code = await execute(['volume', 'ls', '--format', 'json']);
 * ```
 *
 * @packageDocumentation
 */

export { Cli, buildTree, execute } from './cli/runner.js';
export type { CliOptions, CommandDeps } from './cli/runner.js';
export { CommanderTree, effectiveFlags, findChild } from './cli/tree.js';
export type { ActionContext, CommandAction, CommandNode, CommandSpec, CommandTree, FlagSpec, Resolution } from './cli/tree.js';
export { bindFlags, createLifecycle, runLifecycle } from './cli/lifecycle.js';
export type { Invocation, LifecycleStep, LifecycleStepName } from './cli/lifecycle.js';
export { ErrorPresenter, formatError } from './cli/presenter.js';
export { createPermissionGate, permitAll, requireRoot } from './cli/permissions.js';
export type { PermissionGate, PrivilegePolicy } from './cli/permissions.js';
export { ConfigKeys, ConfigStore, createConfigStore } from './config.js';
export type { ConfigTier, ConfigValue } from './config.js';
export * from './core/errors.js';
export * from './core/signals.js';
export { createStorageClient } from './storage/client.js';
export type { StorageClient, StorageClientConfig } from './storage/client.js';
export type * from './storage/types.js';
export { VERSION } from './version.js';
