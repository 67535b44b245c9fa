import { describe, expect, it } from 'vitest';
import { grantsShell, isSnippetAllowed, parseGrant } from '../../src/commands/permissions.js';

describe('parseGrant', () => {
    it('reads a bare tool as grant-all', () => {
        expect(parseGrant('Bash')).toEqual({ tool: 'Bash', kind: 'all' });
    });

    it('reads a :* suffix as a prefix grant', () => {
        expect(parseGrant('Bash(git add:*)')).toEqual({ tool: 'Bash', kind: 'prefix', prefix: 'git add' });
    });

    it('reads anything else as an exact grant', () => {
        expect(parseGrant('Bash(git status)')).toEqual({ tool: 'Bash', kind: 'exact', command: 'git status' });
    });
});

describe('isSnippetAllowed', () => {
    it('allows everything without a grant list', () => {
        expect(isSnippetAllowed('anything', undefined)).toBe(true);
        expect(isSnippetAllowed('anything', [])).toBe(true);
    });

    it('allows everything with a bare shell grant', () => {
        expect(isSnippetAllowed('ls -la', ['Bash'])).toBe(true);
    });

    it('matches prefix grants on a word boundary', () => {
        const grants = ['Bash(git add:*)'];
        expect(isSnippetAllowed('git add .', grants)).toBe(true);
        expect(isSnippetAllowed('git add', grants)).toBe(true);
        expect(isSnippetAllowed('git addx', grants)).toBe(false);
        expect(isSnippetAllowed('rm file', grants)).toBe(false);
    });

    it('matches exact grants only exactly', () => {
        const grants = ['Bash(git status)'];
        expect(isSnippetAllowed(' git status ', grants)).toBe(true);
        expect(isSnippetAllowed('git status -s', grants)).toBe(false);
    });

    it('denies when only non-shell tools are granted', () => {
        expect(isSnippetAllowed('ls', ['Read', 'Write'])).toBe(false);
    });
});

describe('grantsShell', () => {
    it('detects shell tools by name', () => {
        expect(grantsShell(['Read', 'Shell(ls)'])).toBe(true);
        expect(grantsShell(['bash'])).toBe(true);
        expect(grantsShell(['Read'])).toBe(false);
        expect(grantsShell(undefined)).toBe(false);
    });
});
