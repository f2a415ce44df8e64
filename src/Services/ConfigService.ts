import Joi from 'joi';
import { resolve } from 'path';
import { LoadConfig } from '../Config.js';
import { Configurator } from '../Common/Configurator.js';
import { AppError, DescribeError, ValidationError } from '../Common/Errors.js';
import type { ValidatedConfig } from '../Types/Config.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import { DEFAULT_DICTIONARY_PATH } from './Dictionary.js';

/** Joi schema for the scanner configuration; fills in defaults. */
export const CONFIG_SCHEMA = Joi.object<ValidatedConfig>({
    dictionaryPath: Joi.string().default(DEFAULT_DICTIONARY_PATH),
    ignoreWordsFile: Joi.string(),
    fileExtensions: Joi.array().items(Joi.string().pattern(/^[^.,\s][^,\s]*$/)).default([`php`]),
    plaintext: Joi.boolean().default(false),
    withContext: Joi.boolean().default(false),
    linePolicy: Joi.string().valid(`decoded`, `physical`).default(`decoded`),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(`warn`),
})
    .unknown(false)
    .empty(null)
    .default({});

/**
 * Service responsible for loading and validating application configuration.
 * Precedence: CLI overrides > environment > config file > defaults.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded`.
     */
    constructor(eventBus: MainEventBus) {
        this._eventBus = eventBus;
    }

    /**
     * Loads and validates the configuration.
     * @param configPath string | undefined - Optional JSON/YAML config file
     * @param overrides Record<string, unknown> - Values given on the command line (undefined entries are ignored)
     * @param env NodeJS.ProcessEnv - Environment for overrides
     * @returns Promise<ValidatedConfig> - The validated config object with absolute paths
     * @throws ValidationError if loading or validation fails
     * @example
     * const config = await new ConfigService(bus).Load(undefined, { plaintext: true });
     */
    public async Load(configPath: string | undefined, overrides: Readonly<Record<string, unknown>> = {}, env: NodeJS.ProcessEnv = process.env): Promise<ValidatedConfig> {
        let rawConfig: Record<string, unknown>;
        try {
            rawConfig = await LoadConfig(configPath, env);
        } catch(err) {
            if (err instanceof AppError) {
                throw err;
            }
            throw new ValidationError(`Failed to load config from '${configPath}': ${DescribeError(err)}`, { path: configPath });
        }
        for (const [key, value] of Object.entries(overrides)) {
            if (value !== undefined) {
                rawConfig[key] = value;
            }
        }

        const value = new Configurator(CONFIG_SCHEMA, rawConfig).getConfig();
        const validated: ValidatedConfig = {
            ...value,
            dictionaryPath: resolve(value.dictionaryPath),
            ignoreWordsFile: value.ignoreWordsFile ? resolve(value.ignoreWordsFile) : undefined,
        };
        this._eventBus.Emit(`config.loaded`, validated);
        return validated;
    }
}
