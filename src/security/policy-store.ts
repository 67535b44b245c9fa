import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ArgumentError, ConfigError, describeCause } from '../commands/errors.js';
import { isNotFound } from '../utils/paths.js';
import { SECURITY_LEVELS, defaultPolicy, type SecurityLevel, type SecurityPolicy } from './types.js';

export const POLICY_FILE = 'security.yaml';

const PolicyFileSchema = z.object({
    level: z.enum(SECURITY_LEVELS),
    exemptedPatterns: z.array(z.string()).default([]),
});

function unique(values: readonly string[]): string[] {
    return [...new Set(values)];
}

/**
 * Security Policy Store — persists the severity level and exemptions as YAML
 *
 * ```yaml
 * level: enforce
 * exemptedPatterns:
 *   - rm -rf
 * ```
 *
 * Only a missing file falls back to defaults; a corrupt file is a ConfigError.
 */
export class PolicyStore {
    readonly filePath: string;

    constructor(readonly configDir: string) {
        this.filePath = path.join(configDir, POLICY_FILE);
    }

    /** Load the policy, writing defaults first when the file is missing */
    async load(): Promise<SecurityPolicy> {
        const existing = await this.read();
        if (existing) return existing;

        const policy = defaultPolicy();
        await this.save(policy);
        return policy;
    }

    /** Read the policy without side effects; `undefined` when the file is missing */
    async read(): Promise<SecurityPolicy | undefined> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (err) {
            if (isNotFound(err)) return undefined;
            throw new ConfigError(`could not read ${this.filePath} (${describeCause(err)})`, { cause: err });
        }

        let data: unknown;
        try {
            data = parseYaml(content);
        } catch (err) {
            throw new ConfigError(`${this.filePath} is not valid YAML (${describeCause(err)})`, { cause: err });
        }

        const result = PolicyFileSchema.safeParse(data);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`invalid security policy in ${this.filePath}: ${issues}`);
        }

        return { level: result.data.level, exemptedPatterns: unique(result.data.exemptedPatterns) };
    }

    async save(policy: SecurityPolicy): Promise<void> {
        const doc = { level: policy.level, exemptedPatterns: unique(policy.exemptedPatterns) };
        try {
            await mkdir(this.configDir, { recursive: true });
            await writeFile(this.filePath, stringifyYaml(doc), 'utf-8');
        } catch (err) {
            throw new ConfigError(`could not write ${this.filePath} (${describeCause(err)})`, { cause: err });
        }
    }

    async setLevel(level: SecurityLevel): Promise<SecurityPolicy> {
        return this.update(policy => ({ ...policy, level }));
    }

    enable(): Promise<SecurityPolicy> {
        return this.setLevel('enforce');
    }

    disable(): Promise<SecurityPolicy> {
        return this.setLevel('off');
    }

    warnOnly(): Promise<SecurityPolicy> {
        return this.setLevel('warn');
    }

    async addExemption(pattern: string): Promise<SecurityPolicy> {
        const trimmed = pattern.trim();
        if (!trimmed) {
            throw new ArgumentError('security exempt', 'exemption pattern must not be blank');
        }
        return this.update(policy => ({
            ...policy,
            exemptedPatterns: unique([...policy.exemptedPatterns, trimmed]),
        }));
    }

    async removeExemption(pattern: string): Promise<SecurityPolicy> {
        const trimmed = pattern.trim();
        return this.update(policy => ({
            ...policy,
            exemptedPatterns: policy.exemptedPatterns.filter(p => p !== trimmed),
        }));
    }

    private async update(mutate: (policy: SecurityPolicy) => SecurityPolicy): Promise<SecurityPolicy> {
        const next = mutate(await this.load());
        await this.save(next);
        return next;
    }
}

export function levelLabel(level: SecurityLevel): string {
    switch (level) {
        case 'enforce':
            return 'Enabled (enforce)';
        case 'warn':
            return 'Warning only';
        case 'off':
            return 'Disabled';
    }
}

export function statusText(policy: SecurityPolicy): string {
    const lines = [`Security validation: ${levelLabel(policy.level)}`];
    if (policy.exemptedPatterns.length === 0) {
        lines.push('Exempted patterns: none');
    } else {
        lines.push('Exempted patterns:');
        for (const pattern of policy.exemptedPatterns) {
            lines.push(`  - ${pattern}`);
        }
    }
    return lines.join('\n');
}
