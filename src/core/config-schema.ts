/**
 * Config file structure validation.
 *
 * Checks the shape of a YAML config file before it is merged into the
 * ConfigStore. Unknown sections are allowed so storage drivers can carry
 * their own settings.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigLoadError, toError } from './errors.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const durationSchema = z.union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+(ms|s|m|h)?$/, 'expected a duration such as 30s'),
]);

export const cliSectionSchema = z
    .object({
        format: z.enum(['tmpl', 'json', 'jsonp']).optional(),
        template: z.string().optional(),
        templateTabs: z.boolean().optional(),
        quiet: z.boolean().optional(),
        dryRun: z.boolean().optional(),
        continueOnError: z.boolean().optional(),
        idempotent: z.boolean().optional(),
    })
    .strict();

export const volctlSectionSchema = z
    .object({
        logLevel: z.string().optional(),
        host: z.string().optional(),
        service: z.string().optional(),
        cli: cliSectionSchema.optional(),
    })
    .passthrough();

export const storageSectionSchema = z
    .object({
        host: z.string().optional(),
        service: z.string().optional(),
        timeout: durationSchema.optional(),
        pathCache: z.object({ enabled: z.boolean().optional() }).passthrough().optional(),
    })
    .catchall(z.union([scalar, z.record(z.unknown()), z.array(scalar)]));

export const configFileSchema = z
    .object({
        volctl: volctlSectionSchema.optional(),
        storage: storageSectionSchema.optional(),
    })
    .passthrough();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Validates a config file before it is loaded
 */
export interface ConfigValidator {
    validate(path: string): Promise<void>;
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Parses a config file's YAML and checks it against configFileSchema
 */
export async function validateConfigFile(path: string): Promise<ConfigFile> {
    let document: unknown;
    try {
        document = yaml.parse(await readFile(path, 'utf8'));
    } catch (error) {
        throw new ConfigLoadError(path, toError(error).message, error);
    }

    // An empty file is a valid, empty configuration
    if (document === null || document === undefined) {
        return {};
    }

    const result = configFileSchema.safeParse(document);
    if (!result.success) {
        throw new ConfigLoadError(path, describeIssues(result.error), result.error);
    }
    return result.data;
}

export const schemaValidator: ConfigValidator = {
    async validate(path: string): Promise<void> {
        await validateConfigFile(path);
    },
};
