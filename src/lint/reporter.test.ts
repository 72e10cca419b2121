import { describe, it, expect } from 'vitest';
import type { LintReport } from './types.js';
import { formatJson, formatReport, formatText } from './reporter.js';

const report: LintReport = {
    diagnostics: [
        {
            rule: 'broken-reference',
            severity: 'error',
            message: 'Broken reference "references/paging.md"',
            file: 'skills/api/SKILL.md',
            line: 7,
        },
        {
            rule: 'orphan-resource',
            severity: 'info',
            message: 'examples/x.md is not referenced from api/SKILL.md',
            file: 'skills/api/examples/x.md',
        },
    ],
    errorCount: 1,
    warningCount: 0,
    infoCount: 1,
    filesChecked: 4,
};

describe('formatText', () => {
    it('groups diagnostics by file and summarizes', () => {
        expect(formatText(report, { color: false })).toBe([
            'skills/api/SKILL.md',
            '     7  error    Broken reference "references/paging.md"  broken-reference',
            '',
            'skills/api/examples/x.md',
            '     -  info     examples/x.md is not referenced from api/SKILL.md  orphan-resource',
            '',
            '✖ 2 problems (1 error, 0 warnings, 1 info)',
        ].join('\n'));
    });

    it('uses singular words for single counts', () => {
        const single: LintReport = {
            diagnostics: [{ rule: 'unknown-key', severity: 'warning', message: 'm', file: 'commands/a.md', line: 3 }],
            errorCount: 0,
            warningCount: 1,
            infoCount: 0,
            filesChecked: 1,
        };
        const lines = formatText(single, { color: false }).split('\n');
        expect(lines[lines.length - 1]).toBe('✖ 1 problem (0 errors, 1 warning, 0 info)');
    });

    it('reports a clean run', () => {
        const clean: LintReport = { diagnostics: [], errorCount: 0, warningCount: 0, infoCount: 0, filesChecked: 1 };
        expect(formatText(clean, { color: false })).toBe('✓ 1 file checked, no problems');
    });
});

describe('formatJson', () => {
    it('serializes the whole report', () => {
        expect(JSON.parse(formatJson(report))).toEqual(report);
        expect(formatReport(report, 'json')).toBe(formatJson(report));
    });
});
