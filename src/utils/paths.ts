import path from 'node:path';

/**
 * Corpus-relative path with forward slashes, used in diagnostics and ids
 */
export function toCorpusPath(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Whether a corpus-relative path falls under one of the given prefixes
 */
export function isIgnored(relPath: string, prefixes: string[]): boolean {
    return prefixes.some((prefix) => {
        const normalized = prefix.replace(/^\.\//, '').replace(/\/+$/, '');
        if (normalized === '') return false;
        return relPath === normalized || relPath.startsWith(`${normalized}/`);
    });
}

export const KEBAB_CASE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
