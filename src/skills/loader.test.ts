import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { SkillLoader } from './loader.js';
import { makeTempDir, removeDir, writeTree } from '../../test/helpers.js';

describe('SkillLoader', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeTree(root, {
            'skills/api-design/SKILL.md': [
                '---',
                'name: api-design',
                'description: Design REST endpoints with consistent pagination',
                'version: 1.2',
                'allowed-tools: Read, Grep',
                '---',
                'See [pagination](references/pagination.md).',
            ].join('\n'),
            'skills/api-design/references/pagination.md': '# Pagination\n',
            'skills/api-design/references/nested/deep.md': '# Deep\n',
            'skills/api-design/examples/orders.md': '# Orders\n',
            'skills/fallback/SKILL.md': '---\ndescription: No name key\n---\nBody\n',
            'skills/not-a-skill/README.md': 'nothing here',
        });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('loads directories that contain SKILL.md', async () => {
        const loader = new SkillLoader();
        const count = await loader.loadFromDirectory(path.join(root, 'skills'));

        expect(count).toBe(2);
        expect(loader.list().map((skill) => skill.id)).toEqual(['api-design', 'fallback']);
    });

    it('reads metadata and lists resources relative to the skill', async () => {
        const loader = new SkillLoader();
        await loader.loadFromDirectory(path.join(root, 'skills'));
        const skill = loader.get('api-design');

        expect(skill?.description).toBe('Design REST endpoints with consistent pagination');
        expect(skill?.version).toBe('1.2');
        expect(skill?.allowedTools.map((perm) => perm.tool)).toEqual(['Read', 'Grep']);
        expect(skill?.directory).toBe(path.join(root, 'skills', 'api-design'));
        expect(skill?.references).toEqual(['references/nested/deep.md', 'references/pagination.md']);
        expect(skill?.examples).toEqual(['examples/orders.md']);
    });

    it('names a skill after its directory when frontmatter has no name', async () => {
        const loader = new SkillLoader();
        await loader.loadFromDirectory(path.join(root, 'skills'));

        expect(loader.get('fallback')?.name).toBe('fallback');
        expect(loader.get('fallback')?.references).toEqual([]);
    });

    it('returns null for a directory without SKILL.md', async () => {
        const loader = new SkillLoader();
        expect(await loader.loadSkill(path.join(root, 'skills', 'not-a-skill'))).toBeNull();
    });
});
