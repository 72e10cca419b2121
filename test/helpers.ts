import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { PromptDeckConfigInput } from '../src/config/schema.js';
import type { LintReport, LintRule } from '../src/lint/types.js';
import { resolveConfig } from '../src/config/loader.js';
import { loadCorpus } from '../src/corpus/loader.js';
import { Linter } from '../src/lint/linter.js';

/**
 * Create a fresh directory under the OS temp dir
 */
export async function makeTempDir(prefix = 'promptdeck-'): Promise<string> {
    return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Write files keyed by root-relative path. A key ending in `/` creates an
 * empty directory.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [rel, content] of Object.entries(files)) {
        const target = path.join(root, rel);
        if (rel.endsWith('/')) {
            await mkdir(target, { recursive: true });
            continue;
        }
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, content, 'utf-8');
    }
}

/**
 * Write a corpus into a temp dir, load it and run the given rules
 */
export async function lintTree(
    files: Record<string, string>,
    rules: LintRule[],
    config: PromptDeckConfigInput = {}
): Promise<LintReport> {
    const root = await makeTempDir();
    try {
        await writeTree(root, files);
        const corpus = await loadCorpus(root, resolveConfig(config));
        return await new Linter(rules).lint(corpus);
    } finally {
        await removeDir(root);
    }
}
