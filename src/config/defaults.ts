import { PromptDeckConfigSchema, type PromptDeckConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'promptdeck.config.json';

export const DEFAULT_CONFIG: PromptDeckConfig = PromptDeckConfigSchema.parse({});
