import { describe, it, expect } from 'vitest';
import { detectDelimiter, parseDelimited } from './delimitedReader';

describe('detectDelimiter', () => {
    it('picks the most frequent candidate in the header line', () => {
        expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
        expect(detectDelimiter('site|fault\nA|x')).toBe('|');
        expect(detectDelimiter('site\tfault\tteam\n')).toBe('\t');
    });

    it('ignores delimiters inside quotes', () => {
        expect(detectDelimiter('"a,b";c;d\n')).toBe(';');
    });

    it('falls back to comma for a single column', () => {
        expect(detectDelimiter('single\n1\n')).toBe(',');
    });
});

describe('parseDelimited', () => {
    it('handles quoted delimiters, doubled quotes and CRLF', () => {
        const result = parseDelimited('Site,Fault\r\nA,"Link, down"\r\nB,"say ""hi"""\n');

        expect(result.delimiter).toBe(',');
        expect(result.header).toEqual(['Site', 'Fault']);
        expect(result.rows).toEqual([
            ['A', 'Link, down'],
            ['B', 'say "hi"']
        ]);
    });

    it('keeps line breaks inside quoted fields', () => {
        const result = parseDelimited('a,b\n1,"x\ny"\n');
        expect(result.rows).toEqual([['1', 'x\ny']]);
    });

    it('skips rows wider than the header and pads short ones with null', () => {
        const result = parseDelimited('a,b\n1,2,3\n4\n5,6');

        expect(result.rows).toEqual([
            ['4', null],
            ['5', '6']
        ]);
        expect(result.rowsRead).toBe(3);
        expect(result.rowsSkipped).toBe(1);
    });

    it('drops blank lines and a leading BOM', () => {
        const result = parseDelimited('\uFEFFa,b\n\n1,2\n\n');

        expect(result.header).toEqual(['a', 'b']);
        expect(result.rows).toEqual([['1', '2']]);
        expect(result.rowsRead).toBe(1);
    });

    it('skips a trailing row with an unterminated quote', () => {
        const result = parseDelimited('a,b\n1,2\n3,"oops\n');

        expect(result.rows).toEqual([['1', '2']]);
        expect(result.rowsSkipped).toBe(1);
    });

    it('returns no header for empty input', () => {
        expect(parseDelimited('').header).toEqual([]);
    });
});
