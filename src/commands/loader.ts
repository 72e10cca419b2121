import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { CommandDefinition } from './types.js';
import { PROJECT_SOURCE, assetId } from '../corpus/types.js';
import { firstBodyLine, parseFrontmatter, stringField } from '../frontmatter/parser.js';
import { parseToolList } from '../tools/permissions.js';
import { listFiles } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * `argument-hint: [message]` is a YAML list; show it the way it was written
 */
export function argumentHintField(value: unknown): string | undefined {
    if (typeof value === 'string') return value.trim() === '' ? undefined : value.trim();
    if (Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'string')) {
        return value.map((v) => `[${v}]`).join(' ');
    }
    return undefined;
}

/**
 * Command Loader — discovers and parses command .md files
 *
 * Commands are markdown files with optional YAML frontmatter:
 *
 * ```markdown
 * ---
 * description: Create a git commit
 * argument-hint: [message]
 * allowed-tools: Bash(git add:*), Bash(git commit:*)
 * ---
 * ## Context
 * - Current status: !`git status`
 *
 * Create a single commit with message: $ARGUMENTS
 * ```
 *
 * The command name is the file name. Subdirectories namespace a command
 * without changing its name.
 */
export class CommandLoader {
    private commands: CommandDefinition[] = [];

    /**
     * Load commands from a directory tree of .md files
     */
    async loadFromDirectory(dirPath: string, plugin?: string): Promise<number> {
        const files = await listFiles(dirPath, { recursive: true, extension: '.md' });
        let count = 0;

        for (const filePath of files) {
            const cmd = await this.parseCommandFile(filePath, dirPath, plugin);
            if (cmd) {
                this.commands.push(cmd);
                count++;
            }
        }

        logger.debug(`Loaded ${count} command(s) from ${dirPath}`);
        return count;
    }

    /**
     * Parse a single command markdown file
     */
    async parseCommandFile(filePath: string, baseDir: string, plugin?: string): Promise<CommandDefinition | null> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            logger.warn(`Failed to read command at ${filePath}: ${errorMessage(err)}`);
            return null;
        }

        const document = parseFrontmatter(content);
        const { frontmatter } = document;
        const name = path.basename(filePath, '.md');
        const relDir = path.relative(baseDir, path.dirname(filePath));
        const namespace = relDir === '' ? undefined : relDir.split(path.sep).join('/');

        return {
            kind: 'command',
            id: assetId(name, plugin),
            name,
            namespace,
            source: plugin ?? PROJECT_SOURCE,
            plugin,
            description: stringField(frontmatter, 'description')
                ?? firstBodyLine(document.body)
                ?? `Command: ${name}`,
            argumentHint: argumentHintField(frontmatter['argument-hint']),
            allowedTools: parseToolList(frontmatter['allowed-tools']).permissions,
            model: stringField(frontmatter, 'model'),
            prompt: document.body.trim(),
            path: filePath,
            document,
        };
    }

    /**
     * Get a command by id (first loaded wins on duplicates)
     */
    get(id: string): CommandDefinition | undefined {
        return this.commands.find((cmd) => cmd.id === id);
    }

    /**
     * Check if a command exists
     */
    has(id: string): boolean {
        return this.get(id) !== undefined;
    }

    /**
     * List all loaded commands
     */
    list(): CommandDefinition[] {
        return [...this.commands];
    }

    /**
     * Get count of loaded commands
     */
    get size(): number {
        return this.commands.length;
    }
}
