import type { LoadIssue } from '../../corpus/types.js';
import type { LintRule } from '../types.js';

function fromLoadIssues(id: LoadIssue['rule'], description: string): LintRule {
    return {
        id,
        defaultSeverity: 'error',
        description,
        check(corpus) {
            return corpus.issues
                .filter((issue) => issue.rule === id)
                .map((issue) => ({ message: issue.message, path: issue.path }));
        },
    };
}

export const pluginManifest = fromLoadIssues('plugin-manifest', 'Plugin manifests parse and match the schema');
export const hookEvent = fromLoadIssues('hook-event', 'Hook files only bind known events');
export const hookEntry = fromLoadIssues('hook-entry', 'Hook entries are well-formed');

export const pluginRules: LintRule[] = [pluginManifest, hookEvent, hookEntry];
