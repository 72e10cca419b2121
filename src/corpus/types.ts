import type { ParsedDocument } from '../frontmatter/parser.js';
import type { PromptDeckConfig } from '../config/schema.js';
import type { CommandDefinition } from '../commands/types.js';
import type { SkillDefinition } from '../skills/types.js';
import type { AgentDefinition } from '../agents/types.js';
import type { LoadedPlugin } from '../plugins/types.js';
import type { HookRegistry } from '../hooks/registry.js';

export type AssetKind = 'command' | 'skill' | 'agent';

/**
 * Fields shared by every Markdown asset
 */
export interface AssetBase {
    kind: AssetKind;
    /** Lookup id: the name, prefixed with `<plugin>:` for plugin assets */
    id: string;
    name: string;
    /** 'project' or the plugin name */
    source: string;
    /** Owning plugin, unset for project assets */
    plugin?: string;
    description: string;
    /** Absolute path to the .md file */
    path: string;
    document: ParsedDocument;
}

export type Asset = CommandDefinition | SkillDefinition | AgentDefinition;

/**
 * A problem found while loading something other than a single asset
 * (plugin manifests, hook files)
 */
export interface LoadIssue {
    rule: 'plugin-manifest' | 'hook-event' | 'hook-entry';
    message: string;
    path: string;
}

export interface Corpus {
    root: string;
    config: PromptDeckConfig;
    commands: CommandDefinition[];
    skills: SkillDefinition[];
    agents: AgentDefinition[];
    plugins: LoadedPlugin[];
    hooks: HookRegistry;
    issues: LoadIssue[];
}

export const PROJECT_SOURCE = 'project';

export function assetId(name: string, plugin?: string): string {
    return plugin === undefined ? name : `${plugin}:${name}`;
}
