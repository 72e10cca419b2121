import { LineCounter, isMap, isScalar, parseDocument } from 'yaml';
import { errorMessage } from '../utils/errors.js';

/**
 * Frontmatter Parser — splits a Markdown asset into YAML header and body
 *
 * ```markdown
 * ---
 * description: Review the staged diff
 * allowed-tools: Bash(git diff:*), Read
 * ---
 * Review the following changes: !`git diff --cached`
 * ```
 *
 * All line numbers are 1-based lines of the original file.
 */

export interface FrontmatterIssue {
    message: string;
    line?: number;
}

export interface ParsedDocument {
    frontmatter: Record<string, unknown>;
    body: string;
    hasFrontmatter: boolean;
    /** File line where the body starts */
    bodyLine: number;
    /** File line of each top-level frontmatter key */
    keyLines: Record<string, number>;
    issues: FrontmatterIssue[];
}

const FENCE = '---';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseFrontmatter(content: string): ParsedDocument {
    const lines = content.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n').split('\n');

    if (lines[0]?.trimEnd() !== FENCE) {
        return {
            frontmatter: {},
            body: lines.join('\n'),
            hasFrontmatter: false,
            bodyLine: 1,
            keyLines: {},
            issues: [],
        };
    }

    const closing = lines.findIndex((line, idx) => idx > 0 && line.trimEnd() === FENCE);
    if (closing === -1) {
        return {
            frontmatter: {},
            body: lines.join('\n'),
            hasFrontmatter: false,
            bodyLine: 1,
            keyLines: {},
            issues: [{ message: 'unterminated frontmatter block', line: 1 }],
        };
    }

    const yamlText = lines.slice(1, closing).join('\n');
    const body = lines.slice(closing + 1).join('\n');
    const bodyLine = closing + 2;
    // YAML line 1 is file line 2
    const toFileLine = (yamlLine: number) => yamlLine + 1;

    const lineCounter = new LineCounter();
    const doc = parseDocument(yamlText, { lineCounter });

    if (doc.errors.length > 0) {
        return {
            frontmatter: {},
            body,
            hasFrontmatter: true,
            bodyLine,
            keyLines: {},
            issues: doc.errors.map((err) => ({
                message: err.message.split('\n')[0],
                line: err.linePos ? toFileLine(err.linePos[0].line) : 2,
            })),
        };
    }

    let value: unknown;
    try {
        value = doc.toJS();
    } catch (err) {
        return {
            frontmatter: {},
            body,
            hasFrontmatter: true,
            bodyLine,
            keyLines: {},
            issues: [{ message: errorMessage(err), line: 2 }],
        };
    }

    if (value === null || value === undefined) {
        return { frontmatter: {}, body, hasFrontmatter: true, bodyLine, keyLines: {}, issues: [] };
    }

    if (!isRecord(value)) {
        return {
            frontmatter: {},
            body,
            hasFrontmatter: true,
            bodyLine,
            keyLines: {},
            issues: [{ message: 'frontmatter must be a mapping of keys to values', line: 2 }],
        };
    }

    const keyLines: Record<string, number> = {};
    if (isMap(doc.contents)) {
        for (const pair of doc.contents.items) {
            if (isScalar(pair.key) && pair.key.range) {
                keyLines[String(pair.key.value)] = toFileLine(lineCounter.linePos(pair.key.range[0]).line);
            }
        }
    }

    return { frontmatter: value, body, hasFrontmatter: true, bodyLine, keyLines, issues: [] };
}

/**
 * Read a string-valued key, treating any other type as absent
 */
export function stringField(frontmatter: Record<string, unknown>, key: string): string | undefined {
    const value = frontmatter[key];
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed === '' ? undefined : trimmed;
    }
    if (typeof value === 'number') return String(value);
    return undefined;
}

/**
 * First non-empty body line with heading marks stripped
 */
export function firstBodyLine(body: string): string | undefined {
    for (const line of body.split('\n')) {
        const text = line.replace(/^#+\s*/, '').trim();
        if (text !== '') return text;
    }
    return undefined;
}
