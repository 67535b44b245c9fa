import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CommandDefinition, CommandMetadata } from '../src/commands/types.js';
import type { SecurityLevel, SecurityPolicy } from '../src/security/types.js';
import type { Logger } from '../src/utils/logger.js';
import { vi } from 'vitest';

export async function makeTempDir(prefix = 'slashmd-'): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/** Write a file below `root`, creating parent directories */
export async function writeFileAt(root: string, relative: string, content: string): Promise<string> {
    const full = path.join(root, relative);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, 'utf-8');
    return full;
}

export function policy(level: SecurityLevel, exemptedPatterns: string[] = []): SecurityPolicy {
    return { level, exemptedPatterns };
}

export function definition(body: string, metadata?: Partial<CommandMetadata>, name = 'test-cmd'): CommandDefinition {
    return {
        name,
        body,
        metadata: metadata ? { classification: {}, ...metadata } : undefined,
        scope: 'project',
        sourcePath: `/commands/${name}.md`,
    };
}

export function recordingLogger() {
    return {
        debug: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string) => void>(),
    } satisfies Logger;
}
