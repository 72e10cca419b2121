import { describe, it, expect } from 'vitest';
import { toolsFormat, unknownModel, unknownTool } from './tools.js';
import { lintTree } from '../../../test/helpers.js';

describe('tools-format', () => {
    it('reports malformed tool lists at the key line', async () => {
        const report = await lintTree({
            'commands/t.md': '---\ndescription: T\nallowed-tools: Read, Bash(oops\n---\nBody\n',
        }, [toolsFormat]);

        expect(report.diagnostics).toEqual([{
            rule: 'tools-format',
            severity: 'error',
            message: 'allowed-tools: unbalanced parentheses in "Read, Bash(oops"',
            file: 'commands/t.md',
            line: 3,
        }]);
    });
});

describe('unknown-tool', () => {
    it('accepts known and MCP tools only', async () => {
        const report = await lintTree({
            'agents/u.md': '---\nname: u\ndescription: d\ntools: Read, Teleport, mcp__db__query\n---\nBody\n',
        }, [unknownTool]);

        expect(report.diagnostics).toEqual([{
            rule: 'unknown-tool',
            severity: 'warning',
            message: 'Unknown tool "Teleport" in tools',
            file: 'agents/u.md',
            line: 4,
        }]);
    });

    it('reads the known list from config', async () => {
        const report = await lintTree({
            'commands/c.md': '---\ndescription: C\nallowed-tools: Read, Deploy\n---\nBody\n',
        }, [unknownTool], { tools: { known: ['Read', 'Deploy'] } });

        expect(report.diagnostics).toEqual([]);
    });
});

describe('unknown-model', () => {
    it('accepts aliases and full model ids', async () => {
        const report = await lintTree({
            'commands/m.md': '---\ndescription: M\nmodel: gpt-9\n---\nBody\n',
            'commands/ok.md': '---\ndescription: OK\nmodel: claude-sonnet-4-5\n---\nBody\n',
            'agents/a.md': '---\nname: a\ndescription: d\nmodel: opus\n---\nBody\n',
        }, [unknownModel]);

        expect(report.diagnostics).toEqual([{
            rule: 'unknown-model',
            severity: 'warning',
            message: 'Unknown model "gpt-9"; expected one of sonnet, opus, haiku, inherit or a claude-* id',
            file: 'commands/m.md',
            line: 3,
        }]);
    });
});
