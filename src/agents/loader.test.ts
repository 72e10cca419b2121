import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { AgentLoader } from './loader.js';
import { makeTempDir, removeDir, writeTree } from '../../test/helpers.js';

describe('AgentLoader', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeTree(root, {
            'agents/code-reviewer.md': [
                '---',
                'name: code-reviewer',
                'description: Reviews diffs for correctness',
                'tools: Read, Grep, Glob',
                'model: sonnet',
                'color: blue',
                '---',
                'You are a senior reviewer.',
            ].join('\n'),
            'agents/generalist.md': '---\ndescription: Does anything\n---\nHelp out.\n',
            'agents/nested/ignored.md': '---\nname: ignored\n---\nNot loaded.\n',
        });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('loads top-level agent files only', async () => {
        const loader = new AgentLoader();
        expect(await loader.loadFromDirectory(path.join(root, 'agents'))).toBe(2);
        expect(loader.list().map((agent) => agent.id)).toEqual(['code-reviewer', 'generalist']);
    });

    it('reads the persona fields', async () => {
        const loader = new AgentLoader();
        await loader.loadFromDirectory(path.join(root, 'agents'));
        const reviewer = loader.get('code-reviewer');

        expect(reviewer?.description).toBe('Reviews diffs for correctness');
        expect(reviewer?.tools).toEqual([
            { raw: 'Read', tool: 'Read' },
            { raw: 'Grep', tool: 'Grep' },
            { raw: 'Glob', tool: 'Glob' },
        ]);
        expect(reviewer?.model).toBe('sonnet');
        expect(reviewer?.color).toBe('blue');
        expect(reviewer?.prompt).toBe('You are a senior reviewer.');
    });

    it('grants all tools and uses the file name when keys are absent', async () => {
        const loader = new AgentLoader();
        await loader.loadFromDirectory(path.join(root, 'agents'));
        const generalist = loader.get('generalist');

        expect(generalist?.name).toBe('generalist');
        expect(generalist?.tools).toBe('all');
    });
});
