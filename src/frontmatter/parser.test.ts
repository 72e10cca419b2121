import { describe, it, expect } from 'vitest';
import { firstBodyLine, parseFrontmatter, stringField } from './parser.js';

describe('parseFrontmatter', () => {
    it('splits header and body and records key lines', () => {
        const doc = parseFrontmatter([
            '---',
            'description: Review the staged diff',
            'allowed-tools: Read, Grep',
            '---',
            'Review carefully.',
        ].join('\n'));

        expect(doc.hasFrontmatter).toBe(true);
        expect(doc.frontmatter).toEqual({
            'description': 'Review the staged diff',
            'allowed-tools': 'Read, Grep',
        });
        expect(doc.body).toBe('Review carefully.');
        expect(doc.bodyLine).toBe(5);
        expect(doc.keyLines).toEqual({ 'description': 2, 'allowed-tools': 3 });
        expect(doc.issues).toEqual([]);
    });

    it('treats a file without an opening fence as all body', () => {
        const doc = parseFrontmatter('# Title\nText');
        expect(doc.hasFrontmatter).toBe(false);
        expect(doc.body).toBe('# Title\nText');
        expect(doc.bodyLine).toBe(1);
        expect(doc.issues).toEqual([]);
    });

    it('reports an unterminated block on line 1', () => {
        const doc = parseFrontmatter('---\nname: x\n');
        expect(doc.hasFrontmatter).toBe(false);
        expect(doc.issues).toEqual([{ message: 'unterminated frontmatter block', line: 1 }]);
    });

    it('rejects a header that is not a mapping', () => {
        const doc = parseFrontmatter('---\n- a\n- b\n---\nbody');
        expect(doc.frontmatter).toEqual({});
        expect(doc.issues).toEqual([{ message: 'frontmatter must be a mapping of keys to values', line: 2 }]);
    });

    it('maps YAML error lines to file lines', () => {
        const doc = parseFrontmatter('---\nname: a\nname: b\n---\nbody');
        expect(doc.hasFrontmatter).toBe(true);
        expect(doc.frontmatter).toEqual({});
        expect(doc.issues).toHaveLength(1);
        expect(doc.issues[0].message).toContain('Map keys must be unique');
        expect(doc.issues[0].line).toBe(3);
    });

    it('accepts an empty header', () => {
        const doc = parseFrontmatter('---\n---\nbody');
        expect(doc.hasFrontmatter).toBe(true);
        expect(doc.frontmatter).toEqual({});
        expect(doc.body).toBe('body');
        expect(doc.bodyLine).toBe(3);
    });

    it('strips a byte order mark and CRLF line endings', () => {
        const doc = parseFrontmatter('\uFEFF---\r\nname: x\r\n---\r\nhi');
        expect(doc.frontmatter).toEqual({ name: 'x' });
        expect(doc.body).toBe('hi');
    });
});

describe('stringField', () => {
    const frontmatter = { a: '  x  ', b: '', c: 3, d: true };

    it('trims strings and drops blanks', () => {
        expect(stringField(frontmatter, 'a')).toBe('x');
        expect(stringField(frontmatter, 'b')).toBeUndefined();
    });

    it('stringifies numbers and ignores other types', () => {
        expect(stringField(frontmatter, 'c')).toBe('3');
        expect(stringField(frontmatter, 'd')).toBeUndefined();
        expect(stringField(frontmatter, 'missing')).toBeUndefined();
    });
});

describe('firstBodyLine', () => {
    it('returns the first non-empty line without heading marks', () => {
        expect(firstBodyLine('\n\n## Heading here\ntext')).toBe('Heading here');
    });

    it('returns undefined for an empty body', () => {
        expect(firstBodyLine('\n  \n')).toBeUndefined();
    });
});
