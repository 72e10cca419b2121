import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { scaffold } from './scaffold.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { parseFrontmatter } from '../frontmatter/parser.js';
import { loadCorpus } from '../corpus/loader.js';
import { Linter } from '../lint/linter.js';
import { exists } from '../utils/fs.js';
import { ScaffoldError } from '../utils/errors.js';
import { makeTempDir, removeDir } from '../../test/helpers.js';

describe('scaffold', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('writes a command with frontmatter and an arguments placeholder', async () => {
        const files = await scaffold(root, DEFAULT_CONFIG, {
            kind: 'command',
            name: 'deploy',
            description: 'Deploy the app',
            argumentHint: '[env]',
            tools: 'Bash(npm run deploy:*)',
        });

        const target = path.join(root, 'commands', 'deploy.md');
        expect(files).toEqual([target]);

        const doc = parseFrontmatter(await readFile(target, 'utf-8'));
        expect(doc.frontmatter).toEqual({
            'description': 'Deploy the app',
            'argument-hint': '[env]',
            'allowed-tools': 'Bash(npm run deploy:*)',
        });
        expect(doc.body.trim()).toBe('# Deploy\n\nDeploy the app\n\n$ARGUMENTS');
    });

    it('writes a skill inside a plugin with empty resource directories', async () => {
        const files = await scaffold(root, DEFAULT_CONFIG, {
            kind: 'skill',
            name: 'api-design',
            description: 'Design APIs',
            plugin: 'web',
        });

        const skillDir = path.join(root, 'plugins', 'web', 'skills', 'api-design');
        expect(files).toEqual([path.join(skillDir, 'SKILL.md')]);
        expect(await exists(path.join(skillDir, 'references'))).toBe(true);
        expect(await exists(path.join(skillDir, 'examples'))).toBe(true);

        const doc = parseFrontmatter(await readFile(files[0], 'utf-8'));
        expect(doc.frontmatter).toEqual({ name: 'api-design', description: 'Design APIs' });
    });

    it('produces assets that lint clean', async () => {
        await scaffold(root, DEFAULT_CONFIG, { kind: 'command', name: 'deploy', description: 'Deploy the app', argumentHint: '[env]' });
        await scaffold(root, DEFAULT_CONFIG, { kind: 'skill', name: 'api-design', description: 'Design APIs' });
        await scaffold(root, DEFAULT_CONFIG, { kind: 'agent', name: 'reviewer', description: 'Reviews code' });

        const report = await new Linter().lint(await loadCorpus(root));
        expect(report.diagnostics).toEqual([]);
        expect(report.filesChecked).toBe(3);
    });

    it('rejects bad names, blank descriptions and existing files', async () => {
        await expect(scaffold(root, DEFAULT_CONFIG, { kind: 'agent', name: 'Bad Name', description: 'd' }))
            .rejects.toThrow('Invalid name "Bad Name": use lowercase letters, digits and single hyphens');
        await expect(scaffold(root, DEFAULT_CONFIG, { kind: 'agent', name: 'ok', description: '  ' }))
            .rejects.toThrow('A description is required');

        await scaffold(root, DEFAULT_CONFIG, { kind: 'agent', name: 'ok', description: 'd' });
        const again = scaffold(root, DEFAULT_CONFIG, { kind: 'agent', name: 'ok', description: 'd' });
        await expect(again).rejects.toBeInstanceOf(ScaffoldError);
        await expect(again).rejects.toThrow('agents/ok.md already exists');
    });
});
