import path from 'node:path';
import type { Asset, Corpus } from './types.js';
import type { PromptDeckConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { CommandLoader } from '../commands/loader.js';
import { SkillLoader } from '../skills/loader.js';
import { AgentLoader } from '../agents/loader.js';
import { PluginLoader } from '../plugins/loader.js';
import { HookRegistry } from '../hooks/registry.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * Load project assets from the configured paths, then every plugin
 */
export async function loadCorpus(root: string, config: PromptDeckConfig = DEFAULT_CONFIG): Promise<Corpus> {
    const absRoot = path.resolve(root);
    const commandLoader = new CommandLoader();
    const skillLoader = new SkillLoader();
    const agentLoader = new AgentLoader();
    const hookRegistry = new HookRegistry();
    const pluginLoader = new PluginLoader();

    await commandLoader.loadFromDirectory(path.resolve(absRoot, config.paths.commands));
    await skillLoader.loadFromDirectory(path.resolve(absRoot, config.paths.skills));
    await agentLoader.loadFromDirectory(path.resolve(absRoot, config.paths.agents));

    const plugins = await pluginLoader.loadAll(path.resolve(absRoot, config.paths.plugins), {
        commandLoader,
        skillLoader,
        agentLoader,
        hookRegistry,
    });

    return {
        root: absRoot,
        config,
        commands: commandLoader.list(),
        skills: skillLoader.list(),
        agents: agentLoader.list(),
        plugins,
        hooks: hookRegistry,
        issues: pluginLoader.issues,
    };
}

export function allAssets(corpus: Corpus): Asset[] {
    return [...corpus.commands, ...corpus.skills, ...corpus.agents];
}

/**
 * Look up an asset by id, throwing NotFoundError when absent
 */
export function findCommand(corpus: Corpus, id: string) {
    const found = corpus.commands.find((cmd) => cmd.id === id);
    if (!found) throw new NotFoundError('command', id);
    return found;
}

export function findSkill(corpus: Corpus, id: string) {
    const found = corpus.skills.find((skill) => skill.id === id);
    if (!found) throw new NotFoundError('skill', id);
    return found;
}

export function findAgent(corpus: Corpus, id: string) {
    const found = corpus.agents.find((agent) => agent.id === id);
    if (!found) throw new NotFoundError('agent', id);
    return found;
}
