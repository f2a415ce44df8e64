/**
 * Loads and parses configuration files. Generic: not tied to the event bus or any specific runtime.
 */
import { readFile } from 'fs/promises';
import { ValidationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './typo-scan.yml')
 * @returns Promise<unknown> - Parsed config object, validated by the caller
 * @throws Error if file cannot be read or parsed
 * @example
 * const raw = await readConfigFile('./typo-scan.json');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, 'utf-8');

    if (configPath.endsWith('.json')) {
        return JSON.parse(raw);
    }
    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
        // Lazy-load yaml parser only if needed
        const yaml = await import('js-yaml');
        return yaml.load(raw);
    }
    throw new ValidationError('Unsupported config file format. Use .json or .yaml', { path: configPath });
}
