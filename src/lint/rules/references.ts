import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Corpus } from '../../corpus/types.js';
import type { SkillDefinition } from '../../skills/types.js';
import type { LintRule, RuleFinding } from '../types.js';
import { allAssets } from '../../corpus/loader.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Cross-reference checks: relative Markdown links in every asset, and
 * `references/…`-style inline-code paths in skills and their resources.
 */

const LINK = /!?\[[^\]]*\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
const INLINE_CODE = /`([^`\n]+)`/g;
const RESOURCE_PATH = /^(?:\.\/)?(?:references|examples|scripts|assets)\/\S+$/;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const TEMPLATE_CHARS = /[<>{}*$]/;
const FENCE_LINE = /^\s*(```|~~~)/;

export interface Reference {
    target: string;
    /** 0-based line within the scanned text */
    lineIndex: number;
    via: 'link' | 'inline';
}

function normalizeTarget(raw: string): string | undefined {
    if (URL_SCHEME.test(raw) || raw.startsWith('#') || raw.startsWith('//') || TEMPLATE_CHARS.test(raw)) {
        return undefined;
    }
    const withoutAnchor = raw.replace(/[#?].*$/, '');
    if (withoutAnchor === '') return undefined;
    try {
        return decodeURIComponent(withoutAnchor);
    } catch {
        return withoutAnchor;
    }
}

/**
 * Collect reference targets outside fenced code blocks
 */
export function extractReferences(text: string, options: { inlinePaths: boolean }): Reference[] {
    const refs: Reference[] = [];
    let fence: string | null = null;

    text.split('\n').forEach((line, lineIndex) => {
        const fenceMatch = line.match(FENCE_LINE);
        if (fenceMatch) {
            if (fence === null) fence = fenceMatch[1];
            else if (fenceMatch[1] === fence) fence = null;
            return;
        }
        if (fence !== null) return;

        const seen = new Set<string>();
        const add = (raw: string, via: Reference['via']) => {
            const target = normalizeTarget(raw);
            if (target === undefined || seen.has(target)) return;
            seen.add(target);
            refs.push({ target, lineIndex, via });
        };

        for (const match of line.matchAll(LINK)) {
            add(match[1], 'link');
        }
        if (options.inlinePaths) {
            for (const match of line.matchAll(INLINE_CODE)) {
                const code = match[1].trim();
                if (RESOURCE_PATH.test(code)) add(code, 'inline');
            }
        }
    });

    return refs;
}

interface ScannedText {
    path: string;
    text: string;
    /** File line of the first text line */
    firstLine: number;
    /** Directories a relative target may resolve against, in order */
    bases: string[];
    inlinePaths: boolean;
}

async function readText(filePath: string): Promise<string | undefined> {
    try {
        return await readFile(filePath, 'utf-8');
    } catch (err) {
        logger.warn(`Cannot read ${filePath}: ${errorMessage(err)}`);
        return undefined;
    }
}

/**
 * Markdown files under a skill's resource directories, keyed by relative path
 */
export async function readSkillResources(skill: SkillDefinition): Promise<Map<string, string>> {
    const contents = new Map<string, string>();
    for (const rel of [...skill.references, ...skill.examples]) {
        if (!rel.endsWith('.md')) continue;
        const text = await readText(path.join(skill.directory, rel));
        if (text !== undefined) contents.set(rel, text);
    }
    return contents;
}

async function collectTexts(corpus: Corpus): Promise<ScannedText[]> {
    const texts: ScannedText[] = allAssets(corpus).map((asset) => ({
        path: asset.path,
        text: asset.document.body,
        firstLine: asset.document.bodyLine,
        bases: asset.kind === 'skill'
            ? [path.dirname(asset.path), asset.directory]
            : [path.dirname(asset.path)],
        inlinePaths: asset.kind === 'skill',
    }));

    for (const skill of corpus.skills) {
        for (const [rel, text] of await readSkillResources(skill)) {
            const filePath = path.join(skill.directory, rel);
            texts.push({
                path: filePath,
                text,
                firstLine: 1,
                bases: [path.dirname(filePath), skill.directory],
                inlinePaths: true,
            });
        }
    }

    return texts;
}

async function resolves(root: string, bases: string[], target: string): Promise<boolean> {
    if (target.startsWith('/')) {
        return exists(path.join(root, target));
    }
    for (const base of bases) {
        if (await exists(path.resolve(base, target))) return true;
    }
    return false;
}

export const brokenReference: LintRule = {
    id: 'broken-reference',
    defaultSeverity: 'error',
    description: 'Relative links and resource paths point at existing files',
    async check(corpus) {
        const findings: RuleFinding[] = [];

        for (const scanned of await collectTexts(corpus)) {
            const refs = extractReferences(scanned.text, { inlinePaths: scanned.inlinePaths });
            for (const ref of refs) {
                if (await resolves(corpus.root, scanned.bases, ref.target)) continue;
                findings.push({
                    message: `Broken reference "${ref.target}"`,
                    path: scanned.path,
                    line: scanned.firstLine + ref.lineIndex,
                });
            }
        }

        return findings;
    },
};

export const orphanResource: LintRule = {
    id: 'orphan-resource',
    defaultSeverity: 'info',
    description: 'Files under references/ and examples/ are mentioned somewhere in the skill',
    async check(corpus) {
        const findings: RuleFinding[] = [];

        for (const skill of corpus.skills) {
            const resources = await readSkillResources(skill);

            for (const rel of [...skill.references, ...skill.examples]) {
                const base = path.basename(rel);
                const fromSkill = skill.document.body.includes(rel);
                const fromResource = Array.from(resources).some(([otherRel, text]) =>
                    otherRel !== rel && (text.includes(rel) || text.includes(base))
                );
                if (fromSkill || fromResource) continue;

                findings.push({
                    message: `${rel} is not referenced from ${skill.name}/SKILL.md`,
                    path: path.join(skill.directory, rel),
                });
            }
        }

        return findings;
    },
};

export const referenceRules: LintRule[] = [brokenReference, orphanResource];
