import { Argument, Command } from 'commander';
import chalk from 'chalk';
import type { AssetKind } from '../../corpus/types.js';
import { scaffold } from '../../scaffold/scaffold.js';
import { toCorpusPath } from '../../utils/paths.js';
import { ScaffoldError } from '../../utils/errors.js';
import { loadConfigOnly, runAction } from '../context.js';
import { renderSuccess } from '../ui/render.js';

interface NewOptions {
    description?: string;
    plugin?: string;
    argumentHint?: string;
    tools?: string;
}

/**
 * Ask for a description when stdin is interactive
 */
async function promptDescription(kind: AssetKind, name: string): Promise<string> {
    if (!process.stdin.isTTY) {
        throw new ScaffoldError('A description is required (pass --description)');
    }

    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ description: string }>([
        {
            type: 'input',
            name: 'description',
            message: kind === 'skill'
                ? `When should "${name}" be used? (this text decides when the skill triggers)`
                : `Describe ${kind} "${name}":`,
            validate: (input: string) => input.trim() !== '' || 'A description is required',
        },
    ]);
    return answers.description.trim();
}

export function createNewCommand(): Command {
    return new Command('new')
        .description('Scaffold a command, skill or agent with valid frontmatter')
        .addArgument(new Argument('<kind>', 'What to create').choices(['command', 'skill', 'agent']))
        .argument('<name>', 'Kebab-case name')
        .option('-d, --description <text>', 'Description (prompted for when omitted)')
        .option('--plugin <name>', 'Create inside a plugin')
        .option('--argument-hint <hint>', 'Commands: usage hint, adds $ARGUMENTS to the body')
        .option('--tools <list>', 'allowed-tools (commands, skills) or tools (agents)')
        .action(runAction(async (kind: AssetKind, name: string, opts: NewOptions, command: Command) => {
            const { root, config } = await loadConfigOnly(command);
            const description = opts.description ?? await promptDescription(kind, name);

            const files = await scaffold(root, config, {
                kind,
                name,
                description,
                plugin: opts.plugin,
                argumentHint: opts.argumentHint,
                tools: opts.tools,
            });

            for (const file of files) {
                renderSuccess(`Created ${toCorpusPath(root, file)}`);
            }
            console.log(chalk.dim(`  Check it with: ${chalk.white('promptdeck lint')}\n`));
        }));
}
