import { describe, expect, it } from 'vitest';
import { ShellSplitError, shellJoin, shellQuote, shellSplit } from '../../src/utils/shell-words.js';

describe('shellQuote', () => {
    it('leaves safe words alone', () => {
        expect(shellQuote('src/a.ts')).toBe('src/a.ts');
    });

    it('single-quotes words with special characters', () => {
        expect(shellQuote('a b')).toBe("'a b'");
        expect(shellQuote("it's")).toBe("'it'\\''s'");
        expect(shellQuote('')).toBe("''");
    });

    it('joins with spaces', () => {
        expect(shellJoin(['', 'a', '$HOME'])).toBe("'' a '$HOME'");
    });
});

describe('shellSplit', () => {
    it('splits on whitespace and honors quotes and escapes', () => {
        expect(shellSplit(`review 'two words' "say \\"hi\\"" plain\\ space`)).toEqual([
            'review',
            'two words',
            'say "hi"',
            'plain space',
        ]);
    });

    it('joins adjacent quoted parts into one word', () => {
        expect(shellSplit(`a'b c'"d"`)).toEqual(['ab cd']);
    });

    it('keeps empty quoted words', () => {
        expect(shellSplit(`x '' y`)).toEqual(['x', '', 'y']);
    });

    it('returns nothing for blank input', () => {
        expect(shellSplit('   ')).toEqual([]);
    });

    it('rejects an unterminated quote', () => {
        expect(() => shellSplit(`say 'hello`)).toThrow(ShellSplitError);
        expect(() => shellSplit(`say "hello`)).toThrow('unterminated double quote');
    });
});
