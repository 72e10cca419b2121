import path from 'node:path';
import type { Command } from 'commander';
import type { Corpus } from '../corpus/types.js';
import type { PromptDeckConfig } from '../config/schema.js';
import { ConfigLoader } from '../config/loader.js';
import { loadCorpus } from '../corpus/loader.js';
import { PromptDeckError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { renderError } from './ui/render.js';

export interface GlobalOptions {
    root: string;
    config?: string;
    verbose: boolean;
    quiet: boolean;
}

export interface CLIContext {
    root: string;
    config: PromptDeckConfig;
    corpus: Corpus;
}

/**
 * Read the program-level options visible from a subcommand
 */
export function globalOptions(command: Command): GlobalOptions {
    const opts: Record<string, unknown> = command.optsWithGlobals();
    return {
        root: typeof opts['root'] === 'string' ? opts['root'] : process.cwd(),
        config: typeof opts['config'] === 'string' ? opts['config'] : undefined,
        verbose: opts['verbose'] === true,
        quiet: opts['quiet'] === true,
    };
}

export async function loadConfigOnly(command: Command): Promise<{ root: string; config: PromptDeckConfig }> {
    const globals = globalOptions(command);
    if (globals.verbose) logger.setLevel('debug');
    if (globals.quiet) logger.setLevel('error');

    const root = path.resolve(globals.root);
    const { config } = await new ConfigLoader().load(root, globals.config);
    return { root, config };
}

/**
 * Resolve root and config from the global options, then load the corpus
 */
export async function loadContext(command: Command): Promise<CLIContext> {
    const { root, config } = await loadConfigOnly(command);
    const corpus = await loadCorpus(root, config);
    return { root, config, corpus };
}

/**
 * Wrap an action so toolkit errors print cleanly and set exit code 2
 */
export function runAction<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await fn(...args);
        } catch (err) {
            if (err instanceof PromptDeckError) {
                renderError(err.message);
                process.exitCode = 2;
                return;
            }
            renderError(`Unexpected error: ${errorMessage(err)}`);
            if (err instanceof Error && err.stack) logger.debug(err.stack);
            process.exitCode = 2;
        }
    };
}
