import { Command } from 'commander';
import chalk from 'chalk';
import { findCommand } from '../../corpus/loader.js';
import { renderCommand, scanPlaceholders } from '../../commands/template.js';
import { joinArguments } from '../../commands/arguments.js';
import { toCorpusPath } from '../../utils/paths.js';
import { loadContext, runAction } from '../context.js';
import { renderEmpty, renderEntry, renderFields, renderHeading } from '../ui/render.js';

export function createCommandsCommand(): Command {
    const cmd = new Command('commands')
        .description('Inspect and preview slash commands');

    // ─── List commands ───
    cmd.command('list')
        .description('List all commands')
        .option('--json', 'Print as JSON')
        .action(runAction(async (opts: { json?: boolean }, command: Command) => {
            const { corpus, config } = await loadContext(command);

            if (opts.json) {
                console.log(JSON.stringify(corpus.commands.map((c) => ({
                    id: c.id,
                    source: c.source,
                    namespace: c.namespace,
                    description: c.description,
                    argumentHint: c.argumentHint,
                    path: toCorpusPath(corpus.root, c.path),
                })), null, 2));
                return;
            }

            if (corpus.commands.length === 0) {
                renderEmpty('No commands found.', `Create .md files in ${chalk.white(`${config.paths.commands}/`)}`);
                return;
            }

            renderHeading('⚡', 'Commands', corpus.commands.length);
            for (const command of corpus.commands) {
                const meta = [command.source];
                if (command.namespace) meta.push(command.namespace);
                const hint = command.argumentHint ? chalk.dim(` ${command.argumentHint}`) : '';
                renderEntry(`/${command.id}${hint}`, meta, command.description);
            }
        }));

    // ─── Show one command ───
    cmd.command('show')
        .description('Show a command and the placeholders it uses')
        .argument('<id>', 'Command id, e.g. review or my-plugin:review')
        .action(runAction(async (id: string, _opts: Record<string, never>, command: Command) => {
            const { corpus } = await loadContext(command);
            const found = findCommand(corpus, id);
            const scan = scanPlaceholders(found.prompt);

            const placeholders = [
                ...(scan.usesArguments ? ['$ARGUMENTS'] : []),
                ...scan.positional.map((n) => `$${n}`),
            ];

            renderHeading('⚡', `/${found.id}`);
            renderFields([
                ['path', toCorpusPath(corpus.root, found.path)],
                ['source', found.source],
                ['description', found.description],
                ['argument-hint', found.argumentHint],
                ['allowed-tools', found.allowedTools.map((t) => t.raw).join(', ')],
                ['model', found.model],
                ['placeholders', placeholders.join(' ')],
                ['shell', scan.shellCommands.join('; ')],
            ]);
            console.log();
        }));

    // ─── Render a command ───
    cmd.command('render')
        .description('Print the prompt a command expands to for the given arguments')
        .argument('<id>', 'Command id')
        .argument('[args...]', 'Arguments passed to the command')
        .option('--exec', 'Run !`shell` markers allowed by allowed-tools')
        .option('--json', 'Print the full render result as JSON')
        .action(runAction(async (id: string, args: string[], opts: { exec?: boolean; json?: boolean }, command: Command) => {
            const { corpus, config } = await loadContext(command);
            const found = findCommand(corpus, id);

            const result = await renderCommand(found, joinArguments(args), {
                execute: opts.exec === true,
                cwd: corpus.root,
                timeoutMs: config.shell.timeoutMs,
            });

            console.log(opts.json ? JSON.stringify(result, null, 2) : result.prompt);
        }));

    return cmd;
}
