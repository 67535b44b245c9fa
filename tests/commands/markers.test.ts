import { describe, expect, it } from 'vitest';
import {
    findFileReferences,
    findLiteralFileReferences,
    findShellMarkers,
    isUnsafeReference,
    spliceMarkers,
} from '../../src/commands/markers.js';

describe('shell markers', () => {
    it('finds every marker in document order', () => {
        const markers = findShellMarkers('a !`git status` b !`date`');
        expect(markers).toEqual([
            { marker: '!`git status`', command: 'git status' },
            { marker: '!`date`', command: 'date' },
        ]);
    });

    it('ignores plain inline code', () => {
        expect(findShellMarkers('run `npm test` first')).toEqual([]);
    });

    it('replaces markers positionally', () => {
        expect(spliceMarkers('x !`a` y !`b`', ['1', '2'], () => undefined)).toBe('x 1 y 2');
    });
});

describe('file references', () => {
    it('extracts distinct references and skips e-mail addresses', () => {
        const text = 'See @src/a.ts and @README.md.\nmail dev@example.com\n>@quoted.txt @src/a.ts';
        expect(findFileReferences(text)).toEqual(['src/a.ts', 'README.md', 'quoted.txt']);
    });

    it('matches a reference at the very start', () => {
        expect(findFileReferences('@notes.txt')).toEqual(['notes.txt']);
    });

    it('keeps trailing punctuation outside the replacement', () => {
        expect(spliceMarkers('Read @a.txt.', [], ref => `<${ref}>`)).toBe('Read <a.txt>.');
    });

    it('leaves a reference alone when the renderer declines', () => {
        expect(spliceMarkers('Read @a.txt', [], () => undefined)).toBe('Read @a.txt');
    });

    it('skips references inside shell markers', () => {
        const text = '!`cat @inner.txt` and @outer.txt';
        expect(findLiteralFileReferences(text)).toEqual(['outer.txt']);
        expect(spliceMarkers(text, ['OUT'], ref => `<${ref}>`)).toBe('OUT and <outer.txt>');
    });

    it('never rescans inserted text', () => {
        const text = '!`a` @b.txt';
        const result = spliceMarkers(text, ['@b.txt !`a`'], () => '!`a` @b.txt');
        expect(result).toBe('@b.txt !`a` !`a` @b.txt');
    });

    it('classifies absolute and parent-directory paths as unsafe', () => {
        expect(isUnsafeReference('/etc/passwd')).toBe(true);
        expect(isUnsafeReference('../secret.txt')).toBe(true);
        expect(isUnsafeReference('docs/../../x')).toBe(true);
        expect(isUnsafeReference('docs/..notes')).toBe(false);
        expect(isUnsafeReference('./src/a.ts')).toBe(false);
    });
});
