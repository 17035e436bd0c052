/**
 * Configuration Loader
 * Loads and validates configuration from a JSON file
 */

import { readFile } from 'node:fs/promises';
import { ConfigSchema, ConfigValidationError } from './schema';
import type { AppConfig } from './schema';

export const DEFAULT_CONFIG_PATH = 'sl-departures.config.json';

let config: AppConfig | null = null;

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load configuration from JSON file
 * Call once at startup; a missing file yields defaults
 */
export async function loadConfig(path = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) {
            throw error;
        }
        // eslint-disable-next-line no-console -- Logger not configured before config loads
        console.warn(`Config file ${path} not found, using defaults`);
        config = ConfigSchema.parse({});
        return config;
    }

    let rawConfig: unknown;
    try {
        rawConfig = JSON.parse(text);
    } catch (error) {
        throw new Error(`Config file ${path} is not valid JSON`, { cause: error });
    }

    const result = ConfigSchema.safeParse(rawConfig);
    if (!result.success) {
        // eslint-disable-next-line no-console -- Logger not configured before config loads
        console.error('Config validation errors:', result.error.format());
        throw new ConfigValidationError('Invalid configuration', result.error);
    }

    config = result.data;
    return config;
}

/**
 * Get loaded configuration
 * Throws if config not loaded yet
 */
export function getConfig(): AppConfig {
    if (!config) {
        throw new Error('Config not loaded. Call loadConfig() first.');
    }
    return config;
}

export function isConfigLoaded(): boolean {
    return config !== null;
}

/**
 * Reset config (useful for testing)
 */
export function resetConfig(): void {
    config = null;
}

/**
 * Set config directly; partial input is completed with schema defaults
 */
export function setConfig(newConfig: unknown): AppConfig {
    config = ConfigSchema.parse(newConfig);
    return config;
}
