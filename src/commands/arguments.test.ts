import { describe, it, expect } from 'vitest';
import { joinArguments, splitArguments } from './arguments.js';

describe('splitArguments', () => {
    it('splits on whitespace and groups quotes', () => {
        expect(splitArguments(`one "two three" 'four five' six\\ seven`))
            .toEqual(['one', 'two three', 'four five', 'six seven']);
    });

    it('returns no arguments for blank input', () => {
        expect(splitArguments('   ')).toEqual([]);
    });

    it('keeps an explicitly empty quoted argument', () => {
        expect(splitArguments('""')).toEqual(['']);
    });

    it('unescapes inside double quotes only', () => {
        expect(splitArguments('"a\\"b"')).toEqual(['a"b']);
        expect(splitArguments(`'a\\b'`)).toEqual(['a\\b']);
    });

    it('runs an unterminated quote to the end', () => {
        expect(splitArguments('"unterminated here')).toEqual(['unterminated here']);
    });
});

describe('joinArguments', () => {
    it('quotes only where needed', () => {
        const args = ['a', 'b c', '', 'd"e'];
        const joined = joinArguments(args);
        expect(joined).toBe('a "b c" "" "d\\"e"');
        expect(splitArguments(joined)).toEqual(args);
    });
});
