import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { LoadedPlugin, PluginManifest } from './types.js';
import { MANIFEST_LOCATIONS, PluginManifestSchema } from './types.js';
import type { LoadIssue } from '../corpus/types.js';
import type { SkillLoader } from '../skills/loader.js';
import type { CommandLoader } from '../commands/loader.js';
import type { AgentLoader } from '../agents/loader.js';
import type { HookRegistry } from '../hooks/registry.js';
import { exists, listDirectories } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface PluginTargets {
    commandLoader: CommandLoader;
    skillLoader: SkillLoader;
    agentLoader: AgentLoader;
    hookRegistry: HookRegistry;
}

/**
 * Conventional directory plus manifest extras, resolved and de-duplicated
 */
function assetDirs(pluginDir: string, conventional: string, extra: string | string[] | undefined): string[] {
    const extras = extra === undefined ? [] : Array.isArray(extra) ? extra : [extra];
    return Array.from(new Set([conventional, ...extras].map((dir) => path.resolve(pluginDir, dir))));
}

/**
 * Plugin Loader — discovers plugin bundles and loads their assets
 *
 * ```
 * plugins/
 *   python-backend/
 *     .claude-plugin/plugin.json
 *     commands/
 *     skills/
 *     agents/
 *     hooks/hooks.json
 * ```
 *
 * Assets from a plugin get the plugin name as their source, so their ids
 * are `<plugin>:<name>`.
 */
export class PluginLoader {
    private plugins: Map<string, LoadedPlugin> = new Map();
    private loadIssues: LoadIssue[] = [];

    /**
     * Load every plugin directory under `dirPath`
     */
    async loadAll(dirPath: string, targets: PluginTargets): Promise<LoadedPlugin[]> {
        this.plugins.clear();
        this.loadIssues = [];

        for (const pluginDir of await listDirectories(dirPath)) {
            await this.loadPlugin(pluginDir, targets);
        }

        return this.list();
    }

    /**
     * Load a single plugin
     */
    async loadPlugin(pluginDir: string, targets: PluginTargets): Promise<LoadedPlugin> {
        const { manifest, manifestPath } = await this.readManifest(pluginDir);
        const name = manifest.name;

        if (this.plugins.has(name)) {
            this.loadIssues.push({
                rule: 'plugin-manifest',
                message: `Plugin name "${name}" is already used by ${this.plugins.get(name)?.path}`,
                path: manifestPath ?? pluginDir,
            });
        }

        let commandsCount = 0;
        for (const dir of assetDirs(pluginDir, 'commands', manifest.commands)) {
            commandsCount += await targets.commandLoader.loadFromDirectory(dir, name);
        }

        let skillsCount = 0;
        for (const dir of assetDirs(pluginDir, 'skills', manifest.skills)) {
            skillsCount += await targets.skillLoader.loadFromDirectory(dir, name);
        }

        let agentsCount = 0;
        for (const dir of assetDirs(pluginDir, 'agents', manifest.agents)) {
            agentsCount += await targets.agentLoader.loadFromDirectory(dir, name);
        }

        const hooksPath = path.resolve(pluginDir, manifest.hooks ?? path.join('hooks', 'hooks.json'));
        if (manifest.hooks && !(await exists(hooksPath))) {
            this.loadIssues.push({
                rule: 'plugin-manifest',
                message: `Manifest hooks path "${manifest.hooks}" does not exist`,
                path: manifestPath ?? pluginDir,
            });
        }
        const hooks = await targets.hookRegistry.loadFromFile(hooksPath, name);
        this.loadIssues.push(...hooks.issues);

        const loaded: LoadedPlugin = {
            name,
            manifest,
            path: pluginDir,
            manifestPath,
            commandsCount,
            skillsCount,
            agentsCount,
            hooksCount: hooks.count,
        };

        this.plugins.set(name, loaded);
        logger.debug(`Loaded plugin ${name} from ${pluginDir}`);
        return loaded;
    }

    /**
     * Find and validate the manifest; fall back to the directory name
     */
    private async readManifest(pluginDir: string): Promise<{ manifest: PluginManifest; manifestPath?: string }> {
        const fallback: PluginManifest = { name: path.basename(pluginDir) };

        for (const segments of MANIFEST_LOCATIONS) {
            const manifestPath = path.join(pluginDir, ...segments);
            if (!(await exists(manifestPath))) continue;

            let raw: unknown;
            try {
                raw = JSON.parse(await readFile(manifestPath, 'utf-8'));
            } catch (err) {
                this.loadIssues.push({
                    rule: 'plugin-manifest',
                    message: `Cannot parse manifest: ${errorMessage(err)}`,
                    path: manifestPath,
                });
                return { manifest: fallback, manifestPath };
            }

            const result = PluginManifestSchema.safeParse(raw);
            if (!result.success) {
                for (const issue of result.error.issues) {
                    const where = issue.path.length > 0 ? issue.path.join('.') : '(manifest)';
                    this.loadIssues.push({
                        rule: 'plugin-manifest',
                        message: `${where}: ${issue.message}`,
                        path: manifestPath,
                    });
                }
                logger.warn(`Invalid plugin manifest at ${manifestPath}, using directory name`);
                return { manifest: fallback, manifestPath };
            }

            return { manifest: result.data, manifestPath };
        }

        return { manifest: fallback };
    }

    /**
     * Problems found in manifests and hook files during the last load
     */
    get issues(): LoadIssue[] {
        return [...this.loadIssues];
    }

    list(): LoadedPlugin[] {
        return Array.from(this.plugins.values());
    }

    get(name: string): LoadedPlugin | undefined {
        return this.plugins.get(name);
    }

    get size(): number {
        return this.plugins.size;
    }
}
