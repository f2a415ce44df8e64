import type { ObjectSchema } from 'joi';
import { ValidationError } from './Errors.js';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Stored, validated configuration object */
    private readonly _config: T;

    /**
     * Creates a Configurator.
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws ValidationError if validation fails
     * @example
     * const schema = Joi.object({ plaintext: Joi.boolean().default(false) });
     * const configurator = new Configurator(schema, {});
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this.__validate(rawConfig);
    }

    /**
     * Retrieves the stored configuration.
     * @returns T - Validated configuration object
     */
    public getConfig(): T {
        return this._config;
    }

    private __validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig);

        if (error) {
            throw new ValidationError(`Config validation error: ${error.message}`, { path: error.details[0]?.path.join('.') });
        }
        return value;
    }
}
