import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import path from 'node:path';
import {
    commandNameFromPath,
    isMarkdownFile,
    parseTemplate,
    parseTemplateFile,
    splitGrants,
} from '../../src/commands/parser.js';
import { FileReadError, MetadataParseError } from '../../src/commands/errors.js';
import { makeTempDir, removeDir, writeFileAt } from '../helpers.js';

describe('parseTemplate', () => {
    it('returns the trimmed document as body when there is no frontmatter', () => {
        const result = parseTemplate('  # Hello\n\nbody text  \n', 'hello.md');
        expect(result).toEqual({ body: '# Hello\n\nbody text' });
    });

    it('splits frontmatter into metadata and body', () => {
        const raw = [
            '---',
            'description: Review code',
            'argument-hint: <file>',
            'allowed-tools: Bash(git diff:*), Bash(git status)',
            'phase: review',
            'dependencies:',
            '  - lint',
            '  - test',
            '---',
            '',
            '# Review',
            '',
        ].join('\n');

        const result = parseTemplate(raw, 'review.md');

        expect(result.body).toBe('# Review');
        expect(result.metadata).toEqual({
            description: 'Review code',
            argumentHint: '<file>',
            allowedInvocations: ['Bash(git diff:*)', 'Bash(git status)'],
            classification: { phase: 'review', dependencies: 'lint, test' },
        });
    });

    it('accepts blank lines inside the frontmatter block', () => {
        const result = parseTemplate('---\ndescription: a\n\nmodel: fast\n---\nBody', 'x.md');
        expect(result.metadata?.description).toBe('a');
        expect(result.metadata?.model).toBe('fast');
        expect(result.body).toBe('Body');
    });

    it('treats an empty block as no metadata', () => {
        expect(parseTemplate('---\n\n---\nBody', 'x.md')).toEqual({ body: 'Body' });
        expect(parseTemplate('---\n---\nBody', 'x.md')).toEqual({ body: 'Body' });
    });

    it('treats a null document as no metadata', () => {
        expect(parseTemplate('---\n~\n---\nBody', 'x.md')).toEqual({ body: 'Body' });
    });

    it('only recognizes a block at the start of the document', () => {
        const raw = 'Intro\n---\ndescription: nope\n---\nmore';
        expect(parseTemplate(raw, 'x.md')).toEqual({ body: raw });
    });

    it('keeps a later horizontal rule in the body', () => {
        const result = parseTemplate('---\ndescription: x\n---\nA\n---\nB', 'x.md');
        expect(result.body).toBe('A\n---\nB');
    });

    it('handles CRLF line endings', () => {
        const result = parseTemplate('---\r\ndescription: x\r\n---\r\nBody', 'x.md');
        expect(result.metadata?.description).toBe('x');
        expect(result.body).toBe('Body');
    });

    it('stringifies numeric and boolean scalars', () => {
        const result = parseTemplate('---\nversion: 2\nbeta: true\n---\nBody', 'x.md');
        expect(result.metadata?.classification).toEqual({ version: '2', beta: 'true' });
    });

    it('keeps keys named like object builtins as classification', () => {
        const result = parseTemplate('---\nconstructor: x\ntoString: y\n---\nBody', 'x.md');
        expect(result.metadata).toEqual({ classification: { constructor: 'x', toString: 'y' } });
    });

    it('accepts allowed-tools as a YAML list', () => {
        const result = parseTemplate('---\nallowed_invocations:\n  - Bash(git add:*)\n  - Read\n---\nBody', 'x.md');
        expect(result.metadata?.allowedInvocations).toEqual(['Bash(git add:*)', 'Read']);
    });

    it('rejects malformed YAML naming the file', () => {
        expect(() => parseTemplate('---\ndescription: [unclosed\n---\nBody', 'broken.md'))
            .toThrow(MetadataParseError);
        expect(() => parseTemplate('---\ndescription: [unclosed\n---\nBody', 'broken.md'))
            .toThrow(/broken\.md/);
    });

    it('rejects nested objects', () => {
        expect(() => parseTemplate('---\noptions:\n  depth: 1\n---\nBody', 'x.md')).toThrow(MetadataParseError);
    });

    it('rejects a frontmatter block that is not a mapping', () => {
        expect(() => parseTemplate('---\n- a\n- b\n---\nBody', 'x.md'))
            .toThrow('expected a key/value mapping');
    });

    it('rejects a list where a single value is expected', () => {
        expect(() => parseTemplate('---\ndescription:\n  - a\n  - b\n---\nBody', 'x.md'))
            .toThrow("'description' must be a single value");
    });
});

describe('splitGrants', () => {
    it('splits on commas outside parentheses', () => {
        expect(splitGrants('Bash(echo a, b), Read ,')).toEqual(['Bash(echo a, b)', 'Read']);
    });
});

describe('file helpers', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('matches markdown extensions case-insensitively', () => {
        expect(isMarkdownFile('A.MD')).toBe(true);
        expect(isMarkdownFile('notes.markdown')).toBe(true);
        expect(isMarkdownFile('notes.txt')).toBe(false);
    });

    it('derives the command name from the file stem', () => {
        expect(commandNameFromPath(path.join('a', 'b', 'Deploy.MD'))).toBe('Deploy');
    });

    it('reads and parses a file', async () => {
        const file = await writeFileAt(dir, 'hello.md', '---\ndescription: Hi\n---\nHello');
        const result = await parseTemplateFile(file);
        expect(result.metadata?.description).toBe('Hi');
        expect(result.body).toBe('Hello');
    });

    it('reports a missing file as FileReadError', async () => {
        await expect(parseTemplateFile(path.join(dir, 'missing.md'))).rejects.toBeInstanceOf(FileReadError);
    });
});
