import type { Asset } from '../../corpus/types.js';

/**
 * File line of a frontmatter key, or the opening fence when unknown
 */
export function keyLine(asset: Asset, key: string): number {
    return asset.document.keyLines[key] ?? 1;
}

/**
 * File line of the first body line containing `needle`
 */
export function bodyLineOf(asset: Asset, needle: string | RegExp): number | undefined {
    const lines = asset.document.body.split('\n');
    const idx = lines.findIndex((line) =>
        typeof needle === 'string' ? line.includes(needle) : needle.test(line)
    );
    return idx === -1 ? undefined : asset.document.bodyLine + idx;
}

/**
 * Whether frontmatter-level rules should look at this asset: it has a
 * frontmatter block that parsed cleanly
 */
export function hasUsableFrontmatter(asset: Asset): boolean {
    return asset.document.hasFrontmatter && asset.document.issues.length === 0;
}

export function isBlank(value: unknown): boolean {
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}
