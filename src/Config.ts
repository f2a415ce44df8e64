/**
 * Loads configuration settings from an optional config file and environment variables.
 * Validation happens in ConfigService; this layer only gathers raw values.
 */

import { readConfigFile } from './Common/ConfigReader.js';
import { ValidationError } from './Common/Errors.js';

/** Environment variables and the settings they override. */
const ENV_OVERRIDES = {
    TYPO_SCAN_DICTIONARY: `dictionaryPath`,
    TYPO_SCAN_IGNORE_WORDS: `ignoreWordsFile`,
    TYPO_SCAN_LOG_LEVEL: `logLevel`,
} as const;

export type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Loads the raw configuration: config file values (JSON or YAML) with environment overrides on top.
 * @param configPath string | undefined - Path to a config file; omitted means environment only
 * @param env NodeJS.ProcessEnv - Environment to read overrides from
 * @returns Promise<RawConfig> - Unvalidated settings
 * @throws ValidationError if the file does not contain an object
 * @example
 * const raw = await LoadConfig('./typo-scan.yml');
 */
export async function LoadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<RawConfig> {
    const parsedConfig = configPath ? await readConfigFile(configPath) : undefined;
    let config: RawConfig = {};
    if (isRecord(parsedConfig)) {
        config = { ...parsedConfig };
    } else if (parsedConfig !== null && parsedConfig !== undefined) {
        throw new ValidationError(`Config file must contain an object`, { path: configPath });
    }

    for (const [variable, setting] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (value) {
            config[setting] = value;
        }
    }
    return config;
}
