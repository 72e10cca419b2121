import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodError } from 'zod';
import { PromptDeckConfigSchema, type PromptDeckConfig } from './schema.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { ConfigError, errorMessage, isErrnoException } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface LoadedConfig {
    config: PromptDeckConfig;
    /** Absolute path of the file the config came from, if any */
    path?: string;
}

function formatZodError(error: ZodError): string {
    return error.issues
        .map((issue) => {
            const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${where}: ${issue.message}`;
        })
        .join('; ');
}

/**
 * Validate a raw config object against the schema, filling defaults
 */
export function resolveConfig(raw: unknown, source?: string): PromptDeckConfig {
    const result = PromptDeckConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigError(formatZodError(result.error), source);
    }
    return result.data;
}

/**
 * Config Loader — reads promptdeck.config.json from the corpus root
 *
 * A missing default file yields the defaults. A path given explicitly must
 * exist.
 */
export class ConfigLoader {
    async load(root: string, explicitPath?: string): Promise<LoadedConfig> {
        const configPath = explicitPath
            ? path.resolve(root, explicitPath)
            : path.join(root, CONFIG_FILE_NAME);

        let content: string;
        try {
            content = await readFile(configPath, 'utf-8');
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT' && !explicitPath) {
                logger.debug(`No ${CONFIG_FILE_NAME} in ${root}, using defaults`);
                return { config: resolveConfig({}) };
            }
            throw new ConfigError(`cannot read config: ${errorMessage(err)}`, configPath);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (err) {
            throw new ConfigError(`invalid JSON: ${errorMessage(err)}`, configPath);
        }

        logger.debug(`Loaded config from ${configPath}`);
        return { config: resolveConfig(raw, configPath), path: configPath };
    }
}
