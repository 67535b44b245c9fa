import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import path from 'node:path';
import { writeFile } from 'node:fs/promises';
import { ConfigLoader } from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/config/schema.js';
import { ConfigError } from '../../src/commands/errors.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('uses defaults without a config file', async () => {
        expect(await new ConfigLoader({}).load(dir)).toEqual(DEFAULT_CONFIG);
    });

    it('has the documented defaults', () => {
        expect(DEFAULT_CONFIG.enabled).toBe(true);
        expect(DEFAULT_CONFIG.commands).toEqual({
            projectDir: '.slashmd/commands',
            globalDir: '.slashmd/commands',
            cacheTtlMs: 30_000,
        });
        expect(DEFAULT_CONFIG.expansion).toEqual({ shellTimeoutMs: 30_000, maxFileBytes: 1_048_576 });
        expect(DEFAULT_CONFIG.reservedNames).toContain('clear');
    });

    it('merges a partial file over the defaults', async () => {
        await writeFile(
            path.join(dir, 'slashmd.config.json'),
            JSON.stringify({ commands: { projectDir: 'prompts' }, logLevel: 'debug' }),
            'utf-8'
        );

        const config = await new ConfigLoader({}).load(dir);

        expect(config.commands.projectDir).toBe('prompts');
        expect(config.commands.globalDir).toBe('.slashmd/commands');
        expect(config.logLevel).toBe('debug');
    });

    it('lets environment variables win over the file', async () => {
        await writeFile(
            path.join(dir, 'slashmd.config.json'),
            JSON.stringify({ enabled: true, expansion: { maxFileBytes: 10 } }),
            'utf-8'
        );

        const config = await new ConfigLoader({
            SLASHMD_ENABLED: 'false',
            SLASHMD_LOG_LEVEL: 'silent',
            SLASHMD_SHELL_TIMEOUT_MS: '5000',
        }).load(dir);

        expect(config.enabled).toBe(false);
        expect(config.logLevel).toBe('silent');
        expect(config.expansion).toEqual({ shellTimeoutMs: 5000, maxFileBytes: 10 });
    });

    it('rejects invalid JSON', async () => {
        await writeFile(path.join(dir, 'slashmd.config.json'), '{ nope', 'utf-8');
        await expect(new ConfigLoader({}).load(dir)).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects values of the wrong type', async () => {
        await writeFile(path.join(dir, 'slashmd.config.json'), JSON.stringify({ enabled: 'yes' }), 'utf-8');
        await expect(new ConfigLoader({}).load(dir)).rejects.toThrow(/enabled: Expected boolean/);
    });

    it('rejects malformed environment overrides', () => {
        expect(() => new ConfigLoader({ SLASHMD_ENABLED: 'maybe' }).resolve({})).toThrow(ConfigError);
        expect(() => new ConfigLoader({ SLASHMD_LOG_LEVEL: 'loud' }).resolve({})).toThrow(ConfigError);
        expect(() => new ConfigLoader({ SLASHMD_SHELL_TIMEOUT_MS: '-1' }).resolve({})).toThrow(ConfigError);
    });
});
