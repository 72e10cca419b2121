import type { Corpus } from '../corpus/types.js';
import type { SeveritySetting } from '../config/schema.js';
import type { Diagnostic, LintReport, LintRule, Severity } from './types.js';
import { ALL_RULES } from './rules/index.js';
import { allAssets } from '../corpus/loader.js';
import { isIgnored, toCorpusPath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

/**
 * Linter — runs every rule over a loaded corpus
 *
 * Severities come from, in order: `lint.rules` in the config, the finding,
 * the rule default. A rule set to `off` does not run.
 */
export class Linter {
    constructor(private rules: LintRule[] = ALL_RULES) {}

    async lint(corpus: Corpus): Promise<LintReport> {
        const settings = corpus.config.lint.rules;
        const ignore = corpus.config.lint.ignore;
        const diagnostics: Diagnostic[] = [];

        for (const rule of this.rules) {
            const setting: SeveritySetting | undefined = settings[rule.id];
            if (setting === 'off') continue;

            const findings = await rule.check(corpus);
            logger.debug(`${rule.id}: ${findings.length} finding(s)`);

            for (const finding of findings) {
                const file = toCorpusPath(corpus.root, finding.path);
                if (isIgnored(file, ignore)) continue;

                const severity: Severity = setting ?? finding.severity ?? rule.defaultSeverity;
                diagnostics.push({
                    rule: rule.id,
                    severity,
                    message: finding.message,
                    file,
                    ...(finding.line === undefined ? {} : { line: finding.line }),
                });
            }
        }

        diagnostics.sort((a, b) =>
            a.file.localeCompare(b.file)
            || (a.line ?? 0) - (b.line ?? 0)
            || a.rule.localeCompare(b.rule)
            || a.message.localeCompare(b.message)
        );

        const files = new Set(allAssets(corpus).map((asset) => asset.path));
        const filesChecked = Array.from(files).filter((file) => !isIgnored(toCorpusPath(corpus.root, file), ignore)).length;

        return {
            diagnostics,
            errorCount: diagnostics.filter((d) => d.severity === 'error').length,
            warningCount: diagnostics.filter((d) => d.severity === 'warning').length,
            infoCount: diagnostics.filter((d) => d.severity === 'info').length,
            filesChecked,
        };
    }
}
