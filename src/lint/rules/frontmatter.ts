import { z } from 'zod';
import type { Asset, AssetKind } from '../../corpus/types.js';
import type { LintRule, RuleFinding } from '../types.js';
import { allAssets } from '../../corpus/loader.js';
import { COMMAND_KEYS } from '../../commands/types.js';
import { SKILL_KEYS } from '../../skills/types.js';
import { AGENT_KEYS } from '../../agents/types.js';
import { hasUsableFrontmatter, isBlank, keyLine } from './helpers.js';

const StringOrList = z.union([z.string(), z.array(z.string())]);

/**
 * Types of the keys the host reads, per asset kind. Unknown keys pass here
 * and are reported by `unknown-key`.
 */
const FRONTMATTER_SCHEMAS: Record<AssetKind, z.ZodTypeAny> = {
    command: z.object({
        'description': z.string(),
        'argument-hint': StringOrList,
        'allowed-tools': StringOrList,
        'model': z.string(),
        'disable-model-invocation': z.boolean(),
    }).partial().passthrough(),
    skill: z.object({
        name: z.string(),
        description: z.string(),
        version: z.union([z.string(), z.number()]),
        license: z.string(),
        'allowed-tools': StringOrList,
        model: z.string(),
        metadata: z.record(z.string(), z.unknown()),
    }).partial().passthrough(),
    agent: z.object({
        name: z.string(),
        description: z.string(),
        tools: StringOrList,
        model: z.string(),
        color: z.string(),
    }).partial().passthrough(),
};

const KNOWN_KEYS: Record<AssetKind, readonly string[]> = {
    command: COMMAND_KEYS,
    skill: SKILL_KEYS,
    agent: AGENT_KEYS,
};

function label(asset: Asset): string {
    return `${asset.kind} "${asset.id}"`;
}

export const frontmatterSyntax: LintRule = {
    id: 'frontmatter-syntax',
    defaultSeverity: 'error',
    description: 'Frontmatter must be valid YAML mapping',
    check(corpus) {
        return allAssets(corpus).flatMap((asset) =>
            asset.document.issues.map((issue): RuleFinding => ({
                message: `Invalid frontmatter: ${issue.message}`,
                path: asset.path,
                line: issue.line,
            }))
        );
    },
};

export const frontmatterMissing: LintRule = {
    id: 'frontmatter-missing',
    defaultSeverity: 'error',
    description: 'Skills and agents need a frontmatter block; commands should have one',
    check(corpus) {
        return allAssets(corpus)
            .filter((asset) => !asset.document.hasFrontmatter && asset.document.issues.length === 0)
            .map((asset): RuleFinding => ({
                message: `${label(asset)} has no frontmatter block`,
                path: asset.path,
                line: 1,
                severity: asset.kind === 'command' ? 'warning' : 'error',
            }));
    },
};

export const frontmatterSchema: LintRule = {
    id: 'frontmatter-schema',
    defaultSeverity: 'error',
    description: 'Known frontmatter keys must have the expected type',
    check(corpus) {
        const findings: RuleFinding[] = [];
        for (const asset of allAssets(corpus).filter(hasUsableFrontmatter)) {
            const result = FRONTMATTER_SCHEMAS[asset.kind].safeParse(asset.document.frontmatter);
            if (result.success) continue;

            for (const issue of result.error.issues) {
                const key = String(issue.path[0] ?? '');
                findings.push({
                    message: `"${key}" ${issue.message.charAt(0).toLowerCase()}${issue.message.slice(1)}`,
                    path: asset.path,
                    line: keyLine(asset, key),
                });
            }
        }
        return findings;
    },
};

export const requiredField: LintRule = {
    id: 'required-field',
    defaultSeverity: 'error',
    description: 'Skills and agents need a name and a description',
    check(corpus) {
        const findings: RuleFinding[] = [];
        const assets = [...corpus.skills, ...corpus.agents].filter(hasUsableFrontmatter);

        for (const asset of assets) {
            for (const key of ['name', 'description']) {
                if (isBlank(asset.document.frontmatter[key])) {
                    findings.push({
                        message: `${label(asset)} is missing required "${key}"`,
                        path: asset.path,
                        line: 1,
                    });
                }
            }
        }
        return findings;
    },
};

export const commandDescription: LintRule = {
    id: 'command-description',
    defaultSeverity: 'warning',
    description: 'Commands should describe themselves for the command menu',
    check(corpus) {
        return corpus.commands
            .filter((cmd) => hasUsableFrontmatter(cmd) && isBlank(cmd.document.frontmatter['description']))
            .map((cmd): RuleFinding => ({
                message: `${label(cmd)} has no "description"; the menu will show "${cmd.description}"`,
                path: cmd.path,
                line: 1,
            }));
    },
};

export const unknownKey: LintRule = {
    id: 'unknown-key',
    defaultSeverity: 'warning',
    description: 'Frontmatter keys the host does not read',
    check(corpus) {
        const findings: RuleFinding[] = [];
        for (const asset of allAssets(corpus).filter(hasUsableFrontmatter)) {
            const known = KNOWN_KEYS[asset.kind];
            for (const key of Object.keys(asset.document.frontmatter)) {
                if (!known.includes(key)) {
                    findings.push({
                        message: `Unknown ${asset.kind} frontmatter key "${key}"`,
                        path: asset.path,
                        line: keyLine(asset, key),
                    });
                }
            }
        }
        return findings;
    },
};

export const frontmatterRules: LintRule[] = [
    frontmatterSyntax,
    frontmatterMissing,
    frontmatterSchema,
    requiredField,
    commandDescription,
    unknownKey,
];
