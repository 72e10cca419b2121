import path from 'node:path';
import type { Asset } from '../../corpus/types.js';
import type { LintRule, RuleFinding } from '../types.js';
import { allAssets } from '../../corpus/loader.js';
import { stringField } from '../../frontmatter/parser.js';
import { KEBAB_CASE, toCorpusPath } from '../../utils/paths.js';
import { hasUsableFrontmatter, keyLine } from './helpers.js';

export const nameFormat: LintRule = {
    id: 'name-format',
    defaultSeverity: 'error',
    description: 'Skill and agent names are kebab-case and bounded in length',
    check(corpus) {
        const max = corpus.config.lint.maxNameLength;
        const findings: RuleFinding[] = [];

        for (const asset of [...corpus.skills, ...corpus.agents]) {
            if (!KEBAB_CASE.test(asset.name)) {
                findings.push({
                    message: `Name "${asset.name}" must be lowercase letters, digits and single hyphens`,
                    path: asset.path,
                    line: keyLine(asset, 'name'),
                });
            } else if (asset.name.length > max) {
                findings.push({
                    message: `Name "${asset.name}" is longer than ${max} characters`,
                    path: asset.path,
                    line: keyLine(asset, 'name'),
                });
            }
        }
        return findings;
    },
};

export const skillNameMismatch: LintRule = {
    id: 'skill-name-mismatch',
    defaultSeverity: 'warning',
    description: 'A skill name should match its directory',
    check(corpus) {
        return corpus.skills
            .filter((skill) => {
                const declared = stringField(skill.document.frontmatter, 'name');
                return declared !== undefined && declared !== path.basename(skill.directory);
            })
            .map((skill): RuleFinding => ({
                message: `Skill name "${skill.name}" does not match directory "${path.basename(skill.directory)}"`,
                path: skill.path,
                line: keyLine(skill, 'name'),
            }));
    },
};

export const descriptionLength: LintRule = {
    id: 'description-length',
    defaultSeverity: 'warning',
    description: 'Descriptions are bounded so they fit the host context budget',
    check(corpus) {
        const max = corpus.config.lint.maxDescriptionLength;
        return allAssets(corpus)
            .filter((asset) => {
                const declared = hasUsableFrontmatter(asset)
                    ? stringField(asset.document.frontmatter, 'description')
                    : undefined;
                return declared !== undefined && declared.length > max;
            })
            .map((asset): RuleFinding => ({
                message: `Description is ${asset.description.length} characters; keep it under ${max}`,
                path: asset.path,
                line: keyLine(asset, 'description'),
            }));
    },
};

export const duplicateName: LintRule = {
    id: 'duplicate-name',
    defaultSeverity: 'error',
    description: 'Two assets of one kind cannot share an id',
    check(corpus) {
        const seen = new Map<string, Asset>();
        const findings: RuleFinding[] = [];

        for (const asset of allAssets(corpus)) {
            const key = `${asset.kind}:${asset.id}`;
            const first = seen.get(key);
            if (!first) {
                seen.set(key, asset);
                continue;
            }
            findings.push({
                message: `Duplicate ${asset.kind} "${asset.id}" (also defined in ${toCorpusPath(corpus.root, first.path)})`,
                path: asset.path,
                line: 1,
            });
        }
        return findings;
    },
};

export const namingRules: LintRule[] = [
    nameFormat,
    skillNameMismatch,
    descriptionLength,
    duplicateName,
];
