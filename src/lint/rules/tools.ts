import type { Asset } from '../../corpus/types.js';
import type { LintRule, RuleFinding } from '../types.js';
import { allAssets } from '../../corpus/loader.js';
import { isKnownTool, parseToolList } from '../../tools/permissions.js';
import { stringField } from '../../frontmatter/parser.js';
import { hasUsableFrontmatter, keyLine } from './helpers.js';

/**
 * Frontmatter key holding the tool list for an asset kind
 */
function toolKey(asset: Asset): string {
    return asset.kind === 'agent' ? 'tools' : 'allowed-tools';
}

export const toolsFormat: LintRule = {
    id: 'tools-format',
    defaultSeverity: 'error',
    description: 'Tool lists are `Name` or `Name(specifier)` entries',
    check(corpus) {
        const findings: RuleFinding[] = [];
        for (const asset of allAssets(corpus).filter(hasUsableFrontmatter)) {
            const key = toolKey(asset);
            for (const error of parseToolList(asset.document.frontmatter[key]).errors) {
                findings.push({
                    message: `${key}: ${error}`,
                    path: asset.path,
                    line: keyLine(asset, key),
                });
            }
        }
        return findings;
    },
};

export const unknownTool: LintRule = {
    id: 'unknown-tool',
    defaultSeverity: 'warning',
    description: 'Tool names should be ones the host provides',
    check(corpus) {
        const known = corpus.config.tools.known;
        const findings: RuleFinding[] = [];

        for (const asset of allAssets(corpus).filter(hasUsableFrontmatter)) {
            const key = toolKey(asset);
            for (const perm of parseToolList(asset.document.frontmatter[key]).permissions) {
                if (!isKnownTool(perm.tool, known)) {
                    findings.push({
                        message: `Unknown tool "${perm.tool}" in ${key}`,
                        path: asset.path,
                        line: keyLine(asset, key),
                    });
                }
            }
        }
        return findings;
    },
};

export const unknownModel: LintRule = {
    id: 'unknown-model',
    defaultSeverity: 'warning',
    description: 'Model overrides should be an alias or a full model id',
    check(corpus) {
        const models = corpus.config.models;
        const findings: RuleFinding[] = [];

        for (const asset of allAssets(corpus)) {
            const model = stringField(asset.document.frontmatter, 'model');
            if (model === undefined || models.includes(model) || model.startsWith('claude-')) continue;
            findings.push({
                message: `Unknown model "${model}"; expected one of ${models.join(', ')} or a claude-* id`,
                path: asset.path,
                line: keyLine(asset, 'model'),
            });
        }
        return findings;
    },
};

export const toolRules: LintRule[] = [toolsFormat, unknownTool, unknownModel];
