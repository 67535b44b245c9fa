import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

/** Slash commands the host already owns; custom commands of these names are flagged as conflicts */
export const BUILTIN_SLASH_COMMANDS = [
    'clear',
    'compact',
    'context',
    'editor',
    'exit',
    'help',
    'hooks',
    'issue',
    'load',
    'mcp',
    'model',
    'prompts',
    'quit',
    'save',
    'tools',
    'usage',
] as const;

const LogLevelSchema = z.enum(LOG_LEVELS);

export const ConfigSchema = z.object({
    /** Feature flag; when false every expansion fails with FeatureDisabledError */
    enabled: z.boolean().default(true),
    logLevel: LogLevelSchema.default('info'),
    commands: z.object({
        /** Relative to the working directory */
        projectDir: z.string().min(1).default('.slashmd/commands'),
        /** Relative to the home directory */
        globalDir: z.string().min(1).default('.slashmd/commands'),
        cacheTtlMs: z.number().int().nonnegative().default(30_000),
    }).default({}),
    expansion: z.object({
        shellTimeoutMs: z.number().int().positive().default(30_000),
        maxFileBytes: z.number().int().positive().default(1024 * 1024),
    }).default({}),
    security: z.object({
        /** Directory holding security.yaml, relative to the home directory */
        configDir: z.string().min(1).default('.slashmd'),
    }).default({}),
    reservedNames: z.array(z.string()).default([...BUILTIN_SLASH_COMMANDS]),
});

export type SlashmdConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: SlashmdConfig = ConfigSchema.parse({});
