import { Command } from 'commander';
import chalk from 'chalk';
import { findSkill } from '../../corpus/loader.js';
import { SkillMatcher } from '../../skills/matcher.js';
import { toCorpusPath } from '../../utils/paths.js';
import { PromptDeckError } from '../../utils/errors.js';
import { loadContext, runAction } from '../context.js';
import { renderEmpty, renderEntry, renderFields, renderHeading, truncate } from '../ui/render.js';

export function createSkillsCommand(): Command {
    const cmd = new Command('skills')
        .description('Inspect skills and check how their descriptions match tasks');

    cmd.command('list')
        .description('List all skills')
        .option('--json', 'Print as JSON')
        .action(runAction(async (opts: { json?: boolean }, command: Command) => {
            const { corpus, config } = await loadContext(command);

            if (opts.json) {
                console.log(JSON.stringify(corpus.skills.map((s) => ({
                    id: s.id,
                    source: s.source,
                    version: s.version,
                    description: s.description,
                    references: s.references,
                    examples: s.examples,
                    path: toCorpusPath(corpus.root, s.path),
                })), null, 2));
                return;
            }

            if (corpus.skills.length === 0) {
                renderEmpty('No skills found.', `Create ${chalk.white(`${config.paths.skills}/<name>/SKILL.md`)}`);
                return;
            }

            renderHeading('🧩', 'Skills', corpus.skills.length);
            for (const skill of corpus.skills) {
                const meta = [skill.source];
                if (skill.version) meta.push(`v${skill.version}`);
                if (skill.references.length > 0) meta.push(`${skill.references.length} references`);
                if (skill.examples.length > 0) meta.push(`${skill.examples.length} examples`);
                renderEntry(skill.id, meta, skill.description);
            }
        }));

    cmd.command('show')
        .description('Show a skill and its supporting files')
        .argument('<id>', 'Skill id')
        .action(runAction(async (id: string, _opts: Record<string, never>, command: Command) => {
            const { corpus } = await loadContext(command);
            const skill = findSkill(corpus, id);

            renderHeading('🧩', skill.id);
            renderFields([
                ['path', toCorpusPath(corpus.root, skill.path)],
                ['source', skill.source],
                ['version', skill.version],
                ['description', skill.description],
                ['allowed-tools', skill.allowedTools.map((t) => t.raw).join(', ')],
            ]);

            for (const [label, files] of [['references', skill.references], ['examples', skill.examples]] as const) {
                if (files.length === 0) continue;
                console.log(chalk.bold(`\n  ${label}/`));
                for (const file of files) console.log(`    ${file}`);
            }
            console.log();
        }));

    cmd.command('match')
        .description('Rank skills whose name and description cover a task description')
        .argument('<query...>', 'Task description')
        .option('-n, --limit <n>', 'Maximum number of matches', '5')
        .action(runAction(async (query: string[], opts: { limit: string }, command: Command) => {
            const limit = Number(opts.limit);
            if (!Number.isInteger(limit) || limit < 1) {
                throw new PromptDeckError(`--limit must be a positive integer, got "${opts.limit}"`, 'E_USAGE');
            }

            const { corpus } = await loadContext(command);
            const matches = new SkillMatcher(corpus.skills).match(query.join(' '), limit);

            if (matches.length === 0) {
                renderEmpty('No skill matches that description.');
                return;
            }

            renderHeading('🔎', 'Matching skills', matches.length);
            for (const { skill, score, terms } of matches) {
                console.log(`  ${chalk.cyan.bold(skill.id)} ${chalk.dim(`score ${score.toFixed(2)} · ${terms.join(', ')}`)}`);
                console.log(`    ${truncate(skill.description, 100)}\n`);
            }
        }));

    return cmd;
}
