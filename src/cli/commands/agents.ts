import { Command } from 'commander';
import chalk from 'chalk';
import { findAgent } from '../../corpus/loader.js';
import type { AgentDefinition } from '../../agents/types.js';
import { toCorpusPath } from '../../utils/paths.js';
import { loadContext, runAction } from '../context.js';
import { renderEmpty, renderEntry, renderFields, renderHeading } from '../ui/render.js';

function toolSummary(agent: AgentDefinition): string {
    return agent.tools === 'all' ? 'all tools' : agent.tools.map((t) => t.raw).join(', ');
}

export function createAgentsCommand(): Command {
    const cmd = new Command('agents')
        .description('Inspect agent personas');

    cmd.command('list')
        .description('List all agents')
        .option('--json', 'Print as JSON')
        .action(runAction(async (opts: { json?: boolean }, command: Command) => {
            const { corpus, config } = await loadContext(command);

            if (opts.json) {
                console.log(JSON.stringify(corpus.agents.map((a) => ({
                    id: a.id,
                    source: a.source,
                    description: a.description,
                    tools: a.tools === 'all' ? 'all' : a.tools.map((t) => t.raw),
                    model: a.model,
                    path: toCorpusPath(corpus.root, a.path),
                })), null, 2));
                return;
            }

            if (corpus.agents.length === 0) {
                renderEmpty('No agents found.', `Create .md files in ${chalk.white(`${config.paths.agents}/`)}`);
                return;
            }

            renderHeading('🤖', 'Agents', corpus.agents.length);
            for (const agent of corpus.agents) {
                const meta = [agent.source, toolSummary(agent)];
                if (agent.model) meta.push(agent.model);
                renderEntry(agent.id, meta, agent.description);
            }
        }));

    cmd.command('show')
        .description('Show an agent definition')
        .argument('<id>', 'Agent id')
        .action(runAction(async (id: string, _opts: Record<string, never>, command: Command) => {
            const { corpus } = await loadContext(command);
            const agent = findAgent(corpus, id);

            renderHeading('🤖', agent.id);
            renderFields([
                ['path', toCorpusPath(corpus.root, agent.path)],
                ['source', agent.source],
                ['description', agent.description],
                ['tools', toolSummary(agent)],
                ['model', agent.model],
                ['color', agent.color],
            ]);
            console.log();
        }));

    return cmd;
}
