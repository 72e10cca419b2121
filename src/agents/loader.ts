import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { AgentDefinition } from './types.js';
import { PROJECT_SOURCE, assetId } from '../corpus/types.js';
import { parseFrontmatter, stringField } from '../frontmatter/parser.js';
import { parseToolList } from '../tools/permissions.js';
import { listFiles } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Agent Loader — reads `agents/*.md` persona files
 *
 * ```markdown
 * ---
 * name: code-reviewer
 * description: Reviews diffs for correctness and style
 * tools: Read, Grep, Glob
 * model: sonnet
 * ---
 * You are a senior reviewer...
 * ```
 */
export class AgentLoader {
    private agents: AgentDefinition[] = [];

    async loadFromDirectory(dirPath: string, plugin?: string): Promise<number> {
        const files = await listFiles(dirPath, { extension: '.md' });
        let count = 0;

        for (const filePath of files) {
            const agent = await this.parseAgentFile(filePath, plugin);
            if (agent) {
                this.agents.push(agent);
                count++;
            }
        }

        logger.debug(`Loaded ${count} agent(s) from ${dirPath}`);
        return count;
    }

    async parseAgentFile(filePath: string, plugin?: string): Promise<AgentDefinition | null> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            logger.warn(`Failed to read agent at ${filePath}: ${errorMessage(err)}`);
            return null;
        }

        const document = parseFrontmatter(content);
        const { frontmatter } = document;
        const name = stringField(frontmatter, 'name') ?? path.basename(filePath, '.md');
        const tools = frontmatter['tools'] === undefined || frontmatter['tools'] === null
            ? 'all'
            : parseToolList(frontmatter['tools']).permissions;

        return {
            kind: 'agent',
            id: assetId(name, plugin),
            name,
            source: plugin ?? PROJECT_SOURCE,
            plugin,
            description: stringField(frontmatter, 'description') ?? '',
            tools,
            model: stringField(frontmatter, 'model'),
            color: stringField(frontmatter, 'color'),
            prompt: document.body.trim(),
            path: filePath,
            document,
        };
    }

    get(id: string): AgentDefinition | undefined {
        return this.agents.find((agent) => agent.id === id);
    }

    has(id: string): boolean {
        return this.get(id) !== undefined;
    }

    list(): AgentDefinition[] {
        return [...this.agents];
    }

    get size(): number {
        return this.agents.length;
    }
}
