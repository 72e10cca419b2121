import { Command, Option } from 'commander';
import { Linter } from '../../lint/linter.js';
import { formatReport, type ReportFormat } from '../../lint/reporter.js';
import type { LintReport } from '../../lint/types.js';
import { loadContext, runAction } from '../context.js';
import { Spinner } from '../ui/spinner.js';
import { PromptDeckError } from '../../utils/errors.js';

/**
 * Exit status for a report: 1 on errors or too many warnings
 */
export function lintExitCode(report: LintReport, maxWarnings?: number): number {
    if (report.errorCount > 0) return 1;
    if (maxWarnings !== undefined && report.warningCount > maxWarnings) return 1;
    return 0;
}

function parseMaxWarnings(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new PromptDeckError(`--max-warnings must be a non-negative integer, got "${value}"`, 'E_USAGE');
    }
    return n;
}

export function createLintCommand(): Command {
    return new Command('lint')
        .description('Check frontmatter, cross-references and tool permissions across the corpus')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
        .option('--max-warnings <n>', 'Fail when there are more warnings than this')
        .action(runAction(async (opts: { format: ReportFormat; maxWarnings?: string }, command: Command) => {
            const maxWarnings = parseMaxWarnings(opts.maxWarnings);
            const spinner = new Spinner(opts.format === 'text' && Boolean(process.stderr.isTTY));

            spinner.start('Loading corpus...');
            let report: LintReport;
            try {
                const { corpus } = await loadContext(command);
                spinner.update(`Linting ${corpus.commands.length + corpus.skills.length + corpus.agents.length} assets...`);
                report = await new Linter().lint(corpus);
            } finally {
                spinner.stop();
            }

            console.log(formatReport(report, opts.format));
            process.exitCode = lintExitCode(report, maxWarnings);
        }));
}
