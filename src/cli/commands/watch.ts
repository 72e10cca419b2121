import path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { watch, type FSWatcher } from 'chokidar';
import type { PromptDeckConfig } from '../../config/schema.js';
import { CONFIG_FILE_NAME } from '../../config/defaults.js';
import { loadCorpus } from '../../corpus/loader.js';
import { Linter } from '../../lint/linter.js';
import { formatText } from '../../lint/reporter.js';
import { loadConfigOnly, runAction } from '../context.js';
import { renderError, renderSeparator } from '../ui/render.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Watch the corpus directories and call `onChange` (debounced) after edits
 */
export function watchCorpus(
    root: string,
    config: PromptDeckConfig,
    onChange: (changed: string[]) => void,
    debounceMs = 200
): FSWatcher {
    const targets = [
        config.paths.commands,
        config.paths.skills,
        config.paths.agents,
        config.paths.plugins,
        CONFIG_FILE_NAME,
    ];

    const watcher = watch(targets, {
        cwd: root,
        ignoreInitial: true,
        awaitWriteFinish: { stabilityThreshold: debounceMs },
    });

    let pending: string[] = [];
    let debounceTimer: ReturnType<typeof setTimeout> | null = null;

    watcher.on('all', (_event, filePath) => {
        pending.push(filePath);
        if (debounceTimer) clearTimeout(debounceTimer);
        debounceTimer = setTimeout(() => {
            const changed = Array.from(new Set(pending));
            pending = [];
            onChange(changed);
        }, debounceMs);
    });

    return watcher;
}

export function createWatchCommand(): Command {
    return new Command('watch')
        .description('Lint on start and again whenever a corpus file changes')
        .action(runAction(async (_opts: Record<string, never>, command: Command) => {
            const { root, config } = await loadConfigOnly(command);

            // Config edits take effect on the next run; watched paths do not change
            const lintOnce = async () => {
                const current = await loadConfigOnly(command);
                const corpus = await loadCorpus(current.root, current.config);
                const report = await new Linter().lint(corpus);
                console.log(formatText(report));
            };

            await lintOnce();
            console.log(chalk.dim(`\n👁  Watching ${path.relative(process.cwd(), root) || '.'} (Ctrl+C to stop)\n`));

            const watcher = watchCorpus(root, config, (changed) => {
                renderSeparator();
                console.log(chalk.dim(`  ${new Date().toLocaleTimeString()} changed: ${changed.join(', ')}\n`));
                lintOnce().catch((err: unknown) => renderError(errorMessage(err)));
            });

            process.once('SIGINT', () => {
                logger.debug('Stopping watcher');
                watcher.close().then(
                    () => process.exit(0),
                    (err: unknown) => {
                        renderError(errorMessage(err));
                        process.exit(1);
                    }
                );
            });
        }));
}
