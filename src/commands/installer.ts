import { mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { isNotFound } from '../utils/paths.js';

export const SAMPLE_COMMAND_FILE = 'sample-command.md';

export const SAMPLE_COMMAND = `---
description: Example command showing the template format
argument-hint: <topic>
---

# Sample Command

Explain $ARGUMENTS in plain terms, with one short example.

Templates can pull in more context:

- a dollar sign and a position (one to ten) inserts a single argument
- \`@\` followed by a relative path inlines that file
- \`!\` followed by a backticked command inlines its output
`;

export interface InstallResult {
    /** False when the directory already existed and nothing was written */
    created: boolean;
    dir: string;
    files: string[];
}

/**
 * Materialize the project command directory with one example template
 */
export async function initCommandDirectory(dir: string): Promise<InstallResult> {
    try {
        await stat(dir);
        return { created: false, dir, files: [] };
    } catch (err) {
        if (!isNotFound(err)) throw err;
    }

    await mkdir(dir, { recursive: true });
    const samplePath = path.join(dir, SAMPLE_COMMAND_FILE);
    await writeFile(samplePath, SAMPLE_COMMAND, 'utf-8');

    return { created: true, dir, files: [samplePath] };
}
