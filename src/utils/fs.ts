import type { Dirent } from 'node:fs';
import { access, readdir } from 'node:fs/promises';
import path from 'node:path';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

export async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * List files under a directory, sorted, as absolute paths.
 * A missing directory yields an empty list.
 */
export async function listFiles(
    dirPath: string,
    options: { recursive?: boolean; extension?: string } = {}
): Promise<string[]> {
    if (!(await exists(dirPath))) return [];

    let entries: Dirent[];
    try {
        entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
        logger.warn(`Cannot read ${dirPath}: ${errorMessage(err)}`);
        return [];
    }

    const files: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        if (entry.name.startsWith('.')) continue;
        const fullPath = path.join(dirPath, entry.name);

        if (entry.isDirectory()) {
            if (options.recursive) {
                files.push(...await listFiles(fullPath, options));
            }
            continue;
        }
        if (!entry.isFile()) continue;
        if (options.extension && !entry.name.endsWith(options.extension)) continue;
        files.push(fullPath);
    }

    return files;
}

/**
 * Direct subdirectories of a directory, sorted, as absolute paths
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
    if (!(await exists(dirPath))) return [];

    try {
        const entries = await readdir(dirPath, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
            .map((entry) => entry.name)
            .sort((a, b) => a.localeCompare(b))
            .map((name) => path.join(dirPath, name));
    } catch (err) {
        logger.warn(`Cannot read ${dirPath}: ${errorMessage(err)}`);
        return [];
    }
}
