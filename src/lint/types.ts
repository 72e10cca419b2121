import type { Corpus } from '../corpus/types.js';

export const LINT_RULE_IDS = [
    'frontmatter-syntax',
    'frontmatter-missing',
    'frontmatter-schema',
    'required-field',
    'command-description',
    'unknown-key',
    'name-format',
    'skill-name-mismatch',
    'description-length',
    'empty-body',
    'broken-reference',
    'orphan-resource',
    'tools-format',
    'unknown-tool',
    'shell-permission',
    'argument-hint-unused',
    'argument-hint-missing',
    'unknown-model',
    'duplicate-name',
    'unclosed-code-fence',
    'plugin-manifest',
    'hook-event',
    'hook-entry',
] as const;

export type LintRuleId = typeof LINT_RULE_IDS[number];

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
    rule: LintRuleId;
    severity: Severity;
    message: string;
    /** Corpus-relative path with `/` separators */
    file: string;
    line?: number;
}

/**
 * What a rule reports, before config severities and ignores apply
 */
export interface RuleFinding {
    message: string;
    /** Absolute file path */
    path: string;
    line?: number;
    /** Overrides the rule default, e.g. by asset kind */
    severity?: Severity;
}

export interface LintRule {
    id: LintRuleId;
    defaultSeverity: Severity;
    description: string;
    check(corpus: Corpus): RuleFinding[] | Promise<RuleFinding[]>;
}

export interface LintReport {
    diagnostics: Diagnostic[];
    errorCount: number;
    warningCount: number;
    infoCount: number;
    filesChecked: number;
}
