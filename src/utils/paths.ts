import os from 'node:os';
import path from 'node:path';
import type { SlashmdConfig } from '../config/schema.js';

/**
 * Host collaborator: where "here" and "home" are, and whether the feature is on
 */
export interface HostEnvironment {
    cwd(): string;
    home(): string;
    isEnabled(): boolean;
}

export function nodeEnvironment(config: Pick<SlashmdConfig, 'enabled'>): HostEnvironment {
    return {
        cwd: () => process.cwd(),
        home: () => os.homedir(),
        isEnabled: () => config.enabled,
    };
}

export function getProjectCommandsDir(env: HostEnvironment, config: SlashmdConfig): string {
    return path.resolve(env.cwd(), config.commands.projectDir);
}

export function getGlobalCommandsDir(env: HostEnvironment, config: SlashmdConfig): string {
    return path.resolve(env.home(), config.commands.globalDir);
}

export function getSecurityConfigDir(env: HostEnvironment, config: SlashmdConfig): string {
    return path.resolve(env.home(), config.security.configDir);
}

export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
