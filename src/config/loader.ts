import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigSchema, type SlashmdConfig } from './schema.js';
import { ConfigError, describeCause } from '../commands/errors.js';
import { isLogLevel } from '../utils/logger.js';
import { isNotFound } from '../utils/paths.js';

export const CONFIG_FILE = 'slashmd.config.json';

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFlag(name: string, value: string): boolean {
    const v = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

/**
 * Config Loader — reads slashmd.config.json from the working directory
 *
 * Missing file means defaults. Environment variables win over the file:
 *   SLASHMD_ENABLED            → enabled
 *   SLASHMD_LOG_LEVEL          → logLevel
 *   SLASHMD_SHELL_TIMEOUT_MS   → expansion.shellTimeoutMs
 */
export class ConfigLoader {
    constructor(private readonly env: Env = process.env) {}

    async load(cwd: string = process.cwd()): Promise<SlashmdConfig> {
        const filePath = path.join(cwd, CONFIG_FILE);
        const raw = await this.readFile(filePath);
        return this.resolve(raw, filePath);
    }

    /**
     * Validate a raw config object with environment overrides applied
     */
    resolve(raw: Record<string, unknown>, source = CONFIG_FILE): SlashmdConfig {
        const merged = this.applyEnv(raw);
        const result = ConfigSchema.safeParse(merged);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`invalid ${source}: ${issues}`, { context: { source } });
        }
        return result.data;
    }

    private async readFile(filePath: string): Promise<Record<string, unknown>> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            if (isNotFound(err)) return {};
            throw new ConfigError(`could not read ${filePath} (${describeCause(err)})`, { cause: err });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (err) {
            throw new ConfigError(`${filePath} is not valid JSON (${describeCause(err)})`, { cause: err });
        }

        if (!isRecord(parsed)) {
            throw new ConfigError(`${filePath} must contain a JSON object`);
        }
        return parsed;
    }

    private applyEnv(raw: Record<string, unknown>): Record<string, unknown> {
        const out: Record<string, unknown> = { ...raw };

        const enabled = this.env['SLASHMD_ENABLED'];
        if (enabled !== undefined && enabled !== '') {
            out['enabled'] = parseFlag('SLASHMD_ENABLED', enabled);
        }

        const level = this.env['SLASHMD_LOG_LEVEL'];
        if (level !== undefined && level !== '') {
            if (!isLogLevel(level)) {
                throw new ConfigError(`SLASHMD_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${level}"`);
            }
            out['logLevel'] = level;
        }

        const timeout = this.env['SLASHMD_SHELL_TIMEOUT_MS'];
        if (timeout !== undefined && timeout !== '') {
            const ms = Number(timeout);
            if (!Number.isInteger(ms) || ms <= 0) {
                throw new ConfigError(`SLASHMD_SHELL_TIMEOUT_MS must be a positive integer, got "${timeout}"`);
            }
            const expansion = isRecord(raw['expansion']) ? raw['expansion'] : {};
            out['expansion'] = { ...expansion, shellTimeoutMs: ms };
        }

        return out;
    }
}
