import { Command } from 'commander';
import { createLintCommand } from './commands/lint.js';
import { createWatchCommand } from './commands/watch.js';
import { createCommandsCommand } from './commands/commands-cmd.js';
import { createSkillsCommand } from './commands/skills.js';
import { createAgentsCommand } from './commands/agents.js';
import { createPluginsCommand } from './commands/plugins.js';
import { createHooksCommand } from './commands/hooks.js';
import { createNewCommand } from './commands/new.js';

export const VERSION = '0.1.0';

const VALUE_OPTIONS = new Set(['-r', '--root', '-c', '--config']);
const INFO_OPTIONS = new Set(['-h', '--help', '-V', '--version']);

/**
 * Append `lint` when the user arguments name no subcommand (the common case
 * in CI). `argv` is the full process argv.
 */
export function withDefaultCommand(argv: string[]): string[] {
    const args = argv.slice(2);
    for (let i = 0; i < args.length; i++) {
        if (INFO_OPTIONS.has(args[i])) return argv;
        if (VALUE_OPTIONS.has(args[i])) {
            i++;
            continue;
        }
        if (!args[i].startsWith('-')) return argv;
    }
    return [...argv, 'lint'];
}

export function createCLI(): Command {
    const program = new Command('promptdeck')
        .description('Load, lint and preview Markdown commands, skills and agents')
        .version(VERSION)
        .option('-r, --root <dir>', 'Corpus root directory', process.cwd())
        .option('-c, --config <path>', 'Config file (default: <root>/promptdeck.config.json)')
        .option('-v, --verbose', 'Log debug output to stderr')
        .option('-q, --quiet', 'Only log errors');

    program.addCommand(createLintCommand());
    program.addCommand(createWatchCommand());
    program.addCommand(createCommandsCommand());
    program.addCommand(createSkillsCommand());
    program.addCommand(createAgentsCommand());
    program.addCommand(createPluginsCommand());
    program.addCommand(createHooksCommand());
    program.addCommand(createNewCommand());

    return program;
}
