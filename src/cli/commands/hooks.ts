import { Command } from 'commander';
import chalk from 'chalk';
import { ALL_HOOK_EVENTS } from '../../hooks/types.js';
import { loadContext, runAction } from '../context.js';
import { renderEmpty, renderHeading } from '../ui/render.js';

export function createHooksCommand(): Command {
    const cmd = new Command('hooks')
        .description('Inspect lifecycle hooks declared by plugins');

    // ─── List hooks ───
    cmd.command('list')
        .description('List all hooks, grouped by event')
        .option('--json', 'Print as JSON')
        .action(runAction(async (opts: { json?: boolean }, command: Command) => {
            const { corpus, config } = await loadContext(command);
            const byEvent = corpus.hooks.list();

            if (opts.json) {
                console.log(JSON.stringify(byEvent, null, 2));
                return;
            }

            if (corpus.hooks.size === 0) {
                renderEmpty(
                    'No hooks registered.',
                    `Declare hooks in ${chalk.white(`${config.paths.plugins}/<name>/hooks/hooks.json`)}`
                );
                console.log(chalk.dim('Available events:'));
                for (const event of ALL_HOOK_EVENTS) {
                    console.log(chalk.dim(`  • ${event}`));
                }
                return;
            }

            renderHeading('🪝', 'Hooks', corpus.hooks.size);

            for (const { event, hooks } of byEvent) {
                console.log(chalk.cyan.bold(`  ${event}`));
                for (const hook of hooks) {
                    const match = hook.matcher ? chalk.dim(` [matcher: ${hook.matcher}]`) : '';
                    const source = chalk.dim(` (${hook.source})`);
                    for (const action of hook.hooks) {
                        const timeout = action.timeout === undefined ? '' : chalk.dim(` ${action.timeout}s`);
                        console.log(`    → ${chalk.white(action.command)}${timeout}${match}${source}`);
                    }
                }
                console.log();
            }
        }));

    return cmd;
}
