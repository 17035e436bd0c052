/**
 * Configuration Module
 * Unified access point for all configuration
 */

export {
    loadConfig,
    getConfig,
    isConfigLoaded,
    resetConfig,
    setConfig,
    DEFAULT_CONFIG_PATH,
} from './loader';
export { ConfigSchema, TargetConfigSchema, ConfigValidationError } from './schema';
export type { AppConfig, TargetConfig } from './schema';
