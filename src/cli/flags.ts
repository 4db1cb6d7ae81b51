import { ConfigKeys, DEFAULT_CONFIG_FILE } from '../config.js';
import type { FlagSpec } from './tree.js';

export const configFlag: FlagSpec = {
    name: 'config',
    short: 'c',
    type: 'string',
    description: 'Path to the volctl config file',
    default: DEFAULT_CONFIG_FILE,
    persistent: true,
};

export const helpFlag: FlagSpec = {
    name: 'help',
    short: 'h',
    type: 'boolean',
    description: 'Show help for the command',
    persistent: true,
};

/** Output flags; declared on the root and inherited by every command */
export const outputFlags: FlagSpec[] = [
    {
        name: 'format',
        short: 'f',
        type: 'string',
        description: 'The output format (tmpl, json, jsonp)',
        default: 'tmpl',
        choices: ['tmpl', 'json', 'jsonp'],
        persistent: true,
        configKey: ConfigKeys.format,
    },
    {
        name: 'template',
        type: 'string',
        description: "The template to use when --format is 'tmpl'",
        persistent: true,
        configKey: ConfigKeys.template,
    },
    {
        name: 'templateTabs',
        type: 'boolean',
        description: 'Align template output into columns',
        default: true,
        persistent: true,
        configKey: ConfigKeys.templateTabs,
    },
    {
        name: 'quiet',
        short: 'q',
        type: 'boolean',
        description: 'Suppress table headers',
        default: false,
        persistent: true,
        configKey: ConfigKeys.quiet,
    },
];

export const dryRunFlag: FlagSpec = {
    name: 'dryRun',
    short: 'n',
    type: 'boolean',
    description: 'Show what action(s) will occur, but do not execute them',
    default: false,
    persistent: true,
    configKey: ConfigKeys.dryRun,
};

export const continueOnErrorFlag: FlagSpec = {
    name: 'continueOnError',
    type: 'boolean',
    description: 'Continue processing a collection upon error',
    default: false,
    persistent: true,
    configKey: ConfigKeys.continueOnError,
};

export const idempotentFlag: FlagSpec = {
    name: 'idempotent',
    short: 'i',
    type: 'boolean',
    description: 'Make this command idempotent',
    default: false,
    persistent: true,
    configKey: ConfigKeys.idempotent,
};

export const asyncFlag: FlagSpec = {
    name: 'async',
    type: 'boolean',
    description: 'Submit the operation and return without waiting for it',
    default: false,
};

export const forceFlag: FlagSpec = {
    name: 'force',
    type: 'boolean',
    description: 'Force the operation',
    default: false,
};

/** Flags for commands that change storage state; declared on the root */
export const mutationFlags: FlagSpec[] = [dryRunFlag, continueOnErrorFlag, idempotentFlag];

/** Global flags declared on the root command */
export const rootFlags: FlagSpec[] = [
    configFlag,
    {
        name: 'logLevel',
        short: 'l',
        type: 'string',
        description: 'The log level (trace, debug, info, warn, error, fatal)',
        persistent: true,
        configKey: ConfigKeys.logLevel,
    },
    {
        name: 'host',
        type: 'string',
        description: 'The storage service URL',
        persistent: true,
        configKey: ConfigKeys.host,
    },
    {
        name: 'service',
        short: 's',
        type: 'string',
        description: 'The storage service name',
        persistent: true,
        configKey: ConfigKeys.service,
    },
    helpFlag,
    {
        name: 'verbose',
        type: 'boolean',
        description: 'Show verbose help for the command',
        persistent: true,
    },
    ...outputFlags,
    ...mutationFlags,
];
