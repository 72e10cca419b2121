import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { loadContext, runAction } from '../context.js';
import { renderEmpty, renderHeading } from '../ui/render.js';

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Inspect plugin bundles');

    // ─── List plugins ───
    cmd.command('list')
        .description('List plugins and what they provide')
        .action(runAction(async (_opts: Record<string, never>, command: Command) => {
            const { corpus, config } = await loadContext(command);

            if (corpus.plugins.length === 0) {
                renderEmpty('No plugins found.', `Plugins live in ${chalk.white(`${config.paths.plugins}/<name>/`)}`);
                return;
            }

            renderHeading('🔌', 'Plugins', corpus.plugins.length);

            for (const plugin of corpus.plugins) {
                const version = plugin.manifest.version ? chalk.dim(` v${plugin.manifest.version}`) : '';
                console.log(`  ${chalk.cyan.bold(plugin.name)}${version} ${chalk.dim(path.relative(corpus.root, plugin.path))}`);
                if (plugin.manifest.description) {
                    console.log(`    ${plugin.manifest.description}`);
                }

                const parts: string[] = [];
                if (plugin.commandsCount > 0) parts.push(`${plugin.commandsCount} commands`);
                if (plugin.skillsCount > 0) parts.push(`${plugin.skillsCount} skills`);
                if (plugin.agentsCount > 0) parts.push(`${plugin.agentsCount} agents`);
                if (plugin.hooksCount > 0) parts.push(`${plugin.hooksCount} hooks`);

                if (parts.length > 0) {
                    console.log(chalk.dim(`    Provides: ${parts.join(', ')}`));
                }
                if (!plugin.manifestPath) {
                    console.log(chalk.dim('    No manifest; named after its directory'));
                }
                console.log();
            }
        }));

    return cmd;
}
