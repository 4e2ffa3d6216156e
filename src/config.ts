import fs from 'fs';
import yaml from 'js-yaml';
import isDocker from 'is-docker';
import { z } from 'zod';

// Configuration directory - use environment variable or sensible default
export const CONFIG_DIRECTORY = process.env.CONFIG_DIRECTORY || (isDocker() ? '/var/config/' : './config/');
export const CONFIG_FILE_NAME = 'wud-updates.yml';

export function getDefaultConfigFile(): string {
    return CONFIG_DIRECTORY.endsWith('/')
        ? CONFIG_DIRECTORY + CONFIG_FILE_NAME
        : `${CONFIG_DIRECTORY}/${CONFIG_FILE_NAME}`;
}

export const DEFAULT_PROTOCOL = 'http';
export const DEFAULT_PORT = 3000;
export const DEFAULT_USERNAME = 'homeassistant';
export const DEFAULT_UPDATE_INTERVAL = 5_000;
export const MIN_UPDATE_INTERVAL = 1_000;

const instanceSchema = z.object({
    name: z.string().trim().min(1),
    protocol: z.enum(['http', 'https']).default(DEFAULT_PROTOCOL),
    host: z.string().trim().min(1),
    port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
    username: z.string().default(DEFAULT_USERNAME),
    password: z.string().default(''),
    // GitHub token used for release-note lookups
    token: z.string().default('')
});

const apiSchema = z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
    key: z.string().min(1).optional(),
    // Requests per second, shared by all clients
    rateLimit: z.number().positive().default(10),
    // Request timeout in milliseconds
    timeout: z.number().int().positive().default(15_000)
});

export const configSchema = z.object({
    instances: z.array(instanceSchema).min(1),
    updateInterval: z.number().int().min(MIN_UPDATE_INTERVAL).default(DEFAULT_UPDATE_INTERVAL),
    api: apiSchema.optional()
}).superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.instances.forEach((instance, index) => {
        const uniqueId = `${instance.name}_${instance.host}`;
        if (seen.has(uniqueId)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['instances', index],
                message: `Instance '${instance.name}' on ${instance.host} is already configured`
            });
        }
        seen.add(uniqueId);
    });
});

export type InstanceConfig = z.infer<typeof instanceSchema>;
export type APIConfig = z.infer<typeof apiSchema>;
export type WudUpdatesConfig = z.infer<typeof configSchema>;
/** Config as written by hand, before defaults are applied */
export type WudUpdatesConfigInput = z.input<typeof configSchema>;

/**
 * Validate a parsed configuration object and apply defaults.
 * Throws with every failing path listed.
 */
export function validateConfig(raw: unknown): WudUpdatesConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `  ${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid configuration:\n${details}`);
    }
    return result.data;
}

/**
 * Load and validate a configuration file.
 */
export async function loadConfigFile(path?: string): Promise<WudUpdatesConfig> {
    const configPath = path || getDefaultConfigFile();
    try {
        const fileContent = await fs.promises.readFile(configPath, 'utf-8');
        return validateConfig(yaml.load(fileContent));
    } catch (error) {
        throw new Error(`Error loading config file at ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
}
