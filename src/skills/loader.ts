import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { SkillDefinition } from './types.js';
import { SKILL_FILE } from './types.js';
import { PROJECT_SOURCE, assetId } from '../corpus/types.js';
import { parseFrontmatter, stringField } from '../frontmatter/parser.js';
import { parseToolList } from '../tools/permissions.js';
import { exists, listDirectories, listFiles } from '../utils/fs.js';
import { toCorpusPath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Skill Loader — discovers skill directories
 *
 * ```
 * skills/
 *   api-design/
 *     SKILL.md
 *     references/pagination.md
 *     examples/orders-endpoint.md
 * ```
 */
export class SkillLoader {
    private skills: SkillDefinition[] = [];

    /**
     * Load every `<dir>/<skill>/SKILL.md`
     */
    async loadFromDirectory(dirPath: string, plugin?: string): Promise<number> {
        let count = 0;

        for (const skillDir of await listDirectories(dirPath)) {
            const skill = await this.loadSkill(skillDir, plugin);
            if (skill) {
                this.skills.push(skill);
                count++;
            }
        }

        logger.debug(`Loaded ${count} skill(s) from ${dirPath}`);
        return count;
    }

    /**
     * Load a single skill directory; null when it has no SKILL.md
     */
    async loadSkill(skillDir: string, plugin?: string): Promise<SkillDefinition | null> {
        const skillPath = path.join(skillDir, SKILL_FILE);
        if (!(await exists(skillPath))) {
            logger.debug(`Skipping ${skillDir}: no ${SKILL_FILE}`);
            return null;
        }

        let content: string;
        try {
            content = await readFile(skillPath, 'utf-8');
        } catch (err) {
            logger.warn(`Failed to read skill at ${skillPath}: ${errorMessage(err)}`);
            return null;
        }

        const document = parseFrontmatter(content);
        const { frontmatter } = document;
        const name = stringField(frontmatter, 'name') ?? path.basename(skillDir);

        return {
            kind: 'skill',
            id: assetId(name, plugin),
            name,
            source: plugin ?? PROJECT_SOURCE,
            plugin,
            description: stringField(frontmatter, 'description') ?? '',
            version: stringField(frontmatter, 'version'),
            allowedTools: parseToolList(frontmatter['allowed-tools']).permissions,
            directory: skillDir,
            path: skillPath,
            references: await this.listResources(skillDir, 'references'),
            examples: await this.listResources(skillDir, 'examples'),
            document,
        };
    }

    private async listResources(skillDir: string, sub: string): Promise<string[]> {
        const files = await listFiles(path.join(skillDir, sub), { recursive: true });
        return files.map((file) => toCorpusPath(skillDir, file));
    }

    get(id: string): SkillDefinition | undefined {
        return this.skills.find((skill) => skill.id === id);
    }

    has(id: string): boolean {
        return this.get(id) !== undefined;
    }

    list(): SkillDefinition[] {
        return [...this.skills];
    }

    get size(): number {
        return this.skills.length;
    }
}
