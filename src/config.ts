/**
 * volctl Configuration
 *
 * Layered key/value configuration. Every key is resolved across four tiers,
 * highest priority first: flag, env, file, default. Keys are dotted paths
 * and case-insensitive; environment variables are found by replacing dots
 * with underscores and upper-casing (volctl.logLevel -> VOLCTL_LOGLEVEL).
 */

import { readFile } from 'node:fs/promises';
import yaml from 'yaml';

export type ConfigValue = string | number | boolean;

export type ConfigTier = 'default' | 'file' | 'env' | 'flag';

/** Tiers in the order reads consult them */
export const TIER_PRIORITY: readonly ConfigTier[] = ['flag', 'env', 'file', 'default'];

/** Well-known configuration keys */
export const ConfigKeys = {
    logLevel: 'volctl.logLevel',
    host: 'volctl.host',
    service: 'volctl.service',
    format: 'volctl.cli.format',
    template: 'volctl.cli.template',
    templateTabs: 'volctl.cli.templateTabs',
    quiet: 'volctl.cli.quiet',
    dryRun: 'volctl.cli.dryRun',
    continueOnError: 'volctl.cli.continueOnError',
    idempotent: 'volctl.cli.idempotent',
    storageHost: 'storage.host',
    storageService: 'storage.service',
    storageTimeout: 'storage.timeout',
    pathCacheEnabled: 'storage.pathCache.enabled',
} as const;

/** Environment variable that holds (and receives) the config file path */
export const CONFIG_FILE_ENV = 'VOLCTL_CONFIG_FILE';

/** Config file used when neither --config nor VOLCTL_CONFIG_FILE is given */
export const DEFAULT_CONFIG_FILE = '/etc/volctl/config.yml';

export interface ConfigEntry {
    value: ConfigValue;
    tier: ConfigTier;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const DURATION_PATTERN = /^(\d+)(ms|s|m|h)$/;
const DURATION_UNITS: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

function normalizeKey(key: string): string {
    return key.trim().toLowerCase();
}

/**
 * Environment variable name for a config key
 */
export function envVarName(key: string): string {
    return key.trim().replace(/\./g, '_').toUpperCase();
}

/**
 * Flattens a parsed YAML document into dotted keys
 */
export function flattenConfig(
    document: Record<string, unknown>,
    prefix = ''
): Map<string, ConfigValue> {
    const entries = new Map<string, ConfigValue>();
    for (const [name, value] of Object.entries(document)) {
        const key = prefix ? `${prefix}.${name}` : name;
        if (value === null || value === undefined) {
            continue;
        }
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            entries.set(normalizeKey(key), value);
        } else if (Array.isArray(value)) {
            entries.set(normalizeKey(key), value.map(String).join(','));
        } else if (isRecord(value)) {
            for (const [nested, nestedValue] of flattenConfig(value, key)) {
                entries.set(nested, nestedValue);
            }
        }
    }
    return entries;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigStore {
    private readonly tiers: Record<Exclude<ConfigTier, 'env'>, Map<string, ConfigValue>> = {
        default: new Map(),
        file: new Map(),
        flag: new Map(),
    };

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    setDefault(key: string, value: ConfigValue): void {
        this.tiers.default.set(normalizeKey(key), value);
    }

    /**
     * Writes a value into a tier; flag is the highest-priority writable tier
     */
    set(key: string, value: ConfigValue, tier: Exclude<ConfigTier, 'env'> = 'flag'): void {
        this.tiers[tier].set(normalizeKey(key), value);
    }

    /**
     * Sets a value above the file and env tiers without replacing an
     * explicit flag value. Returns false when a flag already holds the key.
     */
    override(key: string, value: ConfigValue): boolean {
        const normalized = normalizeKey(key);
        if (this.tiers.flag.has(normalized)) {
            return false;
        }
        this.tiers.flag.set(normalized, value);
        return true;
    }

    /**
     * Merges a parsed document into the file tier
     */
    mergeFile(document: Record<string, unknown>): void {
        for (const [key, value] of flattenConfig(document)) {
            this.tiers.file.set(key, value);
        }
    }

    /**
     * Reads a YAML config file into the file tier
     */
    async readFile(path: string): Promise<void> {
        const content = await readFile(path, 'utf8');
        const document: unknown = yaml.parse(content);
        if (document === null || document === undefined) {
            return;
        }
        if (!isRecord(document)) {
            throw new Error(`${path} does not contain a mapping`);
        }
        this.mergeFile(document);
    }

    /**
     * Effective value and the tier that supplied it
     */
    lookup(key: string): ConfigEntry | undefined {
        for (const tier of TIER_PRIORITY) {
            const value = this.getFromTier(key, tier);
            if (value !== undefined) {
                return { value, tier };
            }
        }
        return undefined;
    }

    get(key: string): ConfigValue | undefined {
        return this.lookup(key)?.value;
    }

    /**
     * Reads a single tier, ignoring the others
     */
    getFromTier(key: string, tier: ConfigTier): ConfigValue | undefined {
        if (tier === 'env') {
            const value = this.env[envVarName(key)];
            return value === undefined || value === '' ? undefined : value;
        }
        return this.tiers[tier].get(normalizeKey(key));
    }

    getString(key: string): string {
        const value = this.get(key);
        return value === undefined ? '' : String(value);
    }

    getBool(key: string): boolean {
        const value = this.get(key);
        if (typeof value === 'boolean') {
            return value;
        }
        if (typeof value === 'number') {
            return value !== 0;
        }
        if (typeof value === 'string') {
            const lowered = value.trim().toLowerCase();
            if (TRUE_VALUES.has(lowered)) return true;
            if (FALSE_VALUES.has(lowered)) return false;
        }
        return false;
    }

    getInt(key: string): number {
        const value = this.get(key);
        if (typeof value === 'number') {
            return Math.trunc(value);
        }
        if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
            return Number.parseInt(value, 10);
        }
        return 0;
    }

    /**
     * Duration in milliseconds; bare numbers are taken as milliseconds
     */
    getDuration(key: string): number {
        const value = this.get(key);
        if (typeof value === 'number') {
            return value;
        }
        if (typeof value !== 'string') {
            return 0;
        }
        const match = DURATION_PATTERN.exec(value.trim());
        if (!match) {
            return /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : 0;
        }
        return Number.parseInt(match[1], 10) * DURATION_UNITS[match[2]];
    }

    /**
     * Every key known to the default, file or flag tiers, sorted
     */
    keys(): string[] {
        const keys = new Set<string>();
        for (const tier of Object.values(this.tiers)) {
            for (const key of tier.keys()) {
                keys.add(key);
            }
        }
        return [...keys].sort();
    }
}

/**
 * Creates a store seeded with volctl's defaults
 */
export function createConfigStore(env: NodeJS.ProcessEnv = process.env): ConfigStore {
    const config = new ConfigStore(env);
    config.setDefault(ConfigKeys.logLevel, 'warn');
    config.setDefault(ConfigKeys.storageTimeout, '30s');
    config.setDefault(ConfigKeys.pathCacheEnabled, true);
    return config;
}
