/**
 * Plugin System — Types
 *
 * A plugin is a directory that bundles commands, skills, agents and hooks
 * under one name, optionally described by a `plugin.json` manifest.
 */

import { z } from 'zod';
import { KEBAB_CASE } from '../utils/paths.js';

const PathListSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Plugin manifest (.claude-plugin/plugin.json or plugin.json)
 */
export const PluginManifestSchema = z.object({
    /** Unique plugin name */
    name: z.string().regex(KEBAB_CASE, 'must be kebab-case'),
    /** Semver version */
    version: z.string().optional(),
    description: z.string().optional(),
    author: z.union([
        z.string(),
        z.object({
            name: z.string(),
            email: z.string().optional(),
            url: z.string().optional(),
        }),
    ]).optional(),
    homepage: z.string().optional(),
    repository: z.string().optional(),
    license: z.string().optional(),
    keywords: z.array(z.string()).optional(),

    /** Extra command directories, relative to the plugin */
    commands: PathListSchema.optional(),
    /** Extra skill directories, relative to the plugin */
    skills: PathListSchema.optional(),
    /** Extra agent directories, relative to the plugin */
    agents: PathListSchema.optional(),
    /** Relative path to a hooks.json */
    hooks: z.string().optional(),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

export const MANIFEST_LOCATIONS = [
    ['.claude-plugin', 'plugin.json'],
    ['plugin.json'],
] as const;

/**
 * Loaded plugin with resolved paths
 */
export interface LoadedPlugin {
    name: string;
    /** Parsed manifest; a minimal `{ name }` when the plugin has none or it is invalid */
    manifest: PluginManifest;
    /** Absolute path to the plugin directory */
    path: string;
    /** Absolute path of the manifest file, if found */
    manifestPath?: string;
    commandsCount: number;
    skillsCount: number;
    agentsCount: number;
    hooksCount: number;
}
