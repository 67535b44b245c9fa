import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { SAMPLE_COMMAND, initCommandDirectory } from '../../src/commands/installer.js';
import { parseTemplate } from '../../src/commands/parser.js';
import { findFileReferences, findShellMarkers } from '../../src/commands/markers.js';
import { makeTempDir, removeDir, writeFileAt } from '../helpers.js';

describe('initCommandDirectory', () => {
    let base: string;

    beforeEach(async () => {
        base = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(base);
    });

    it('creates the directory with a sample command', async () => {
        const dir = path.join(base, '.slashmd', 'commands');
        const result = await initCommandDirectory(dir);

        const samplePath = path.join(dir, 'sample-command.md');
        expect(result).toEqual({ created: true, dir, files: [samplePath] });
        expect(await readFile(samplePath, 'utf-8')).toBe(SAMPLE_COMMAND);
    });

    it('leaves an existing directory alone', async () => {
        const dir = path.join(base, 'commands');
        await writeFileAt(dir, 'mine.md', 'Mine');

        expect(await initCommandDirectory(dir)).toEqual({ created: false, dir, files: [] });
    });

    it('writes a sample that parses and has no live markers', () => {
        const parsed = parseTemplate(SAMPLE_COMMAND, 'sample-command.md');

        expect(parsed.metadata?.description).toBe('Example command showing the template format');
        expect(parsed.metadata?.argumentHint).toBe('<topic>');
        expect(findShellMarkers(parsed.body)).toEqual([]);
        expect(findFileReferences(parsed.body)).toEqual([]);
    });
});
