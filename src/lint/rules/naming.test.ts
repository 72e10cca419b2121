import { describe, it, expect } from 'vitest';
import { descriptionLength, duplicateName, nameFormat, skillNameMismatch } from './naming.js';
import { lintTree } from '../../../test/helpers.js';

describe('name-format', () => {
    it('rejects names that are not kebab-case', async () => {
        const report = await lintTree({
            'agents/bad.md': '---\nname: Bad_Name\ndescription: d\n---\nBody\n',
        }, [nameFormat]);

        expect(report.diagnostics).toEqual([{
            rule: 'name-format',
            severity: 'error',
            message: 'Name "Bad_Name" must be lowercase letters, digits and single hyphens',
            file: 'agents/bad.md',
            line: 2,
        }]);
    });

    it('enforces the configured maximum length', async () => {
        const report = await lintTree({
            'skills/long-skill-name/SKILL.md': '---\nname: long-skill-name\ndescription: d\n---\nBody\n',
        }, [nameFormat], { lint: { maxNameLength: 10 } });

        expect(report.diagnostics.map((d) => d.message)).toEqual(['Name "long-skill-name" is longer than 10 characters']);
    });
});

describe('skill-name-mismatch', () => {
    it('compares the declared name with the directory', async () => {
        const report = await lintTree({
            'skills/folder/SKILL.md': '---\nname: other\ndescription: d\n---\nBody\n',
            'skills/same/SKILL.md': '---\nname: same\ndescription: d\n---\nBody\n',
        }, [skillNameMismatch]);

        expect(report.diagnostics).toEqual([{
            rule: 'skill-name-mismatch',
            severity: 'warning',
            message: 'Skill name "other" does not match directory "folder"',
            file: 'skills/folder/SKILL.md',
            line: 2,
        }]);
    });
});

describe('description-length', () => {
    it('flags descriptions over the limit', async () => {
        const report = await lintTree({
            'agents/wordy.md': '---\nname: wordy\ndescription: This is far too long\n---\nBody\n',
            'agents/terse.md': '---\nname: terse\ndescription: Short\n---\nBody\n',
        }, [descriptionLength], { lint: { maxDescriptionLength: 10 } });

        expect(report.diagnostics).toEqual([{
            rule: 'description-length',
            severity: 'warning',
            message: 'Description is 20 characters; keep it under 10',
            file: 'agents/wordy.md',
            line: 3,
        }]);
    });
});

describe('duplicate-name', () => {
    it('reports the second asset with the same id', async () => {
        const report = await lintTree({
            'agents/a.md': '---\nname: twin\ndescription: d\n---\nBody\n',
            'agents/b.md': '---\nname: twin\ndescription: d\n---\nBody\n',
        }, [duplicateName]);

        expect(report.diagnostics).toEqual([{
            rule: 'duplicate-name',
            severity: 'error',
            message: 'Duplicate agent "twin" (also defined in agents/a.md)',
            file: 'agents/b.md',
            line: 1,
        }]);
    });

    it('keeps plugin assets apart from project assets', async () => {
        const report = await lintTree({
            'commands/deploy.md': '---\ndescription: d\n---\nBody\n',
            'plugins/ops/commands/deploy.md': '---\ndescription: d\n---\nBody\n',
        }, [duplicateName]);

        expect(report.diagnostics).toEqual([]);
    });
});
