import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Diagnostic, LintReport, Severity } from './types.js';

export type ReportFormat = 'text' | 'json';

export interface TextFormatOptions {
    /** Disable color regardless of terminal support */
    color?: boolean;
}

function severityColor(c: ChalkInstance, severity: Severity): ChalkInstance {
    switch (severity) {
        case 'error':
            return c.red;
        case 'warning':
            return c.yellow;
        case 'info':
            return c.blue;
    }
}

function plural(count: number, word: string): string {
    return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Human-readable report grouped by file
 *
 * ```
 * skills/api-design/SKILL.md
 *      7  error    Broken reference "references/paging.md"  broken-reference
 *
 * ✖ 1 problem (1 error, 0 warnings, 0 info)
 * ```
 */
export function formatText(report: LintReport, options: TextFormatOptions = {}): string {
    const c = options.color === false ? new Chalk({ level: 0 }) : chalk;
    const lines: string[] = [];

    const byFile = new Map<string, Diagnostic[]>();
    for (const d of report.diagnostics) {
        const list = byFile.get(d.file) ?? [];
        list.push(d);
        byFile.set(d.file, list);
    }

    for (const [file, diagnostics] of byFile) {
        lines.push(c.underline(file));
        for (const d of diagnostics) {
            const line = String(d.line ?? '-').padStart(6);
            const severity = severityColor(c, d.severity)(d.severity.padEnd(7));
            lines.push(`${c.dim(line)}  ${severity}  ${d.message}  ${c.dim(d.rule)}`);
        }
        lines.push('');
    }

    const total = report.diagnostics.length;
    if (total === 0) {
        lines.push(c.green(`✓ ${plural(report.filesChecked, 'file')} checked, no problems`));
    } else {
        const summary = `✖ ${plural(total, 'problem')} (${plural(report.errorCount, 'error')}, `
            + `${plural(report.warningCount, 'warning')}, ${report.infoCount} info)`;
        lines.push(report.errorCount > 0 ? c.red.bold(summary) : c.yellow.bold(summary));
    }

    return lines.join('\n');
}

export function formatJson(report: LintReport): string {
    return JSON.stringify(report, null, 2);
}

export function formatReport(report: LintReport, format: ReportFormat, options: TextFormatOptions = {}): string {
    return format === 'json' ? formatJson(report) : formatText(report, options);
}
