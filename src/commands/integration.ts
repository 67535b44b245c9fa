import { CommandCache } from './cache.js';
import { ArgumentError, FeatureDisabledError, NotFoundError, describeCause } from './errors.js';
import { CommandExpander, type ExpandOptions } from './expander.js';
import { formatCommandHelp, formatCommandList } from './help.js';
import { initCommandDirectory, type InstallResult } from './installer.js';
import { CommandRepository } from './repository.js';
import type { ShellRunner } from './shell-runner.js';
import { toSummary, type CommandDefinition, type CommandRoot, type CommandSummary, type PreviewReport } from './types.js';
import { DEFAULT_CONFIG, type SlashmdConfig } from '../config/schema.js';
import { PolicyStore, statusText } from '../security/policy-store.js';
import type { SecurityLevel, SecurityPolicy } from '../security/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
    getGlobalCommandsDir,
    getProjectCommandsDir,
    getSecurityConfigDir,
    nodeEnvironment,
    type HostEnvironment,
} from '../utils/paths.js';
import { RwLock } from '../utils/rw-lock.js';
import { ShellSplitError, shellSplit } from '../utils/shell-words.js';

export interface CustomCommandsOptions {
    config?: SlashmdConfig;
    env?: HostEnvironment;
    logger?: Logger;
    runShell?: ShellRunner;
    clock?: () => number;
}

export interface DispatchRequest {
    name: string;
    args: string[];
}

/**
 * Split a raw `/name arg 'quoted arg'` line into name and arguments
 */
export function parseInvocation(line: string): DispatchRequest {
    const match = /^\/?(\S*)\s*([\s\S]*)$/.exec(line.trim());
    const name = match?.[1] ?? '';
    if (!name) {
        throw new ArgumentError('(none)', 'missing command name');
    }

    try {
        return { name, args: shellSplit(match?.[2] ?? '') };
    } catch (err) {
        if (err instanceof ShellSplitError) {
            throw new ArgumentError(name, err.message);
        }
        throw err;
    }
}

/**
 * Custom Commands — the surface a chat host talks to
 *
 * Wires discovery, caching, the security policy and expansion together and
 * honors the host's feature flag.
 */
export class CustomCommands {
    readonly config: SlashmdConfig;
    readonly env: HostEnvironment;
    readonly repository: CommandRepository;
    readonly cache: CommandCache;
    readonly policyStore: PolicyStore;
    private readonly logger: Logger;
    private readonly runShell?: ShellRunner;
    private readonly policyLock = new RwLock();

    constructor(options: CustomCommandsOptions = {}) {
        this.config = options.config ?? DEFAULT_CONFIG;
        this.env = options.env ?? nodeEnvironment(this.config);
        this.logger = options.logger ?? silentLogger;
        this.runShell = options.runShell;
        this.repository = new CommandRepository({ logger: this.logger });
        this.cache = new CommandCache(this.repository, () => this.roots(), {
            ttlMs: this.config.commands.cacheTtlMs,
            clock: options.clock,
            logger: this.logger,
        });
        this.policyStore = new PolicyStore(getSecurityConfigDir(this.env, this.config));
    }

    get projectDir(): string {
        return getProjectCommandsDir(this.env, this.config);
    }

    get globalDir(): string {
        return getGlobalCommandsDir(this.env, this.config);
    }

    roots(): CommandRoot[] {
        return [
            { dir: this.projectDir, scope: 'project' },
            { dir: this.globalDir, scope: 'global' },
        ];
    }

    // ─── Commands ────────────────────────────────────────────

    async isKnown(name: string): Promise<boolean> {
        if (!this.env.isEnabled()) return false;
        try {
            return await this.cache.has(name);
        } catch (err) {
            this.logger.debug(`Lookup of '${name}' failed: ${describeCause(err)}`);
            return false;
        }
    }

    async expand(name: string, args: readonly string[] = [], options: ExpandOptions = {}): Promise<string> {
        const definition = await this.resolve(name);
        const policy = await this.getPolicy();
        this.logger.debug(`Expanding /${name} with ${args.length} argument(s)`);
        return this.expander().expand(definition, args, policy, options);
    }

    async dispatch(line: string, options: ExpandOptions = {}): Promise<string> {
        const { name, args } = parseInvocation(line);
        return this.expand(name, args, options);
    }

    async preview(name: string, args: readonly string[] = []): Promise<PreviewReport> {
        const definition = await this.resolve(name);
        const policy = await this.getPolicy();
        return this.expander().preview(definition, args, policy);
    }

    async list(): Promise<CommandSummary[]> {
        this.assertEnabled();
        const definitions = await this.cache.all();
        return definitions.map(toSummary);
    }

    async show(name?: string): Promise<string> {
        if (name) {
            return formatCommandHelp(await this.resolve(name));
        }
        return formatCommandList(await this.list(), this.config.commands.projectDir);
    }

    /**
     * Custom commands whose names shadow the host's built-in slash commands
     */
    async conflicts(summaries?: readonly CommandSummary[]): Promise<string[]> {
        const reserved = new Set(this.config.reservedNames);
        const candidates = summaries ?? await this.list();
        return candidates.filter(s => reserved.has(s.name)).map(s => s.name);
    }

    /**
     * Re-read one command from disk and update the cache with the result
     */
    async reload(name: string): Promise<CommandDefinition | undefined> {
        this.assertEnabled();
        const definition = await this.repository.reloadOne(name, this.roots());
        if (definition) {
            await this.cache.add(definition);
        } else {
            await this.cache.remove(name);
        }
        return definition;
    }

    refresh(): Promise<void> {
        return this.cache.refresh();
    }

    async init(): Promise<InstallResult> {
        const result = await initCommandDirectory(this.projectDir);
        this.cache.invalidate();
        return result;
    }

    // ─── Security policy ─────────────────────────────────────

    /**
     * Readers share the lock; creating the default file takes the write side
     */
    async getPolicy(): Promise<SecurityPolicy> {
        const existing = await this.policyLock.read(() => this.policyStore.read());
        if (existing) return existing;
        return this.policyLock.write(() => this.policyStore.load());
    }

    setLevel(level: SecurityLevel): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.setLevel(level));
    }

    enableSecurity(): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.enable());
    }

    disableSecurity(): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.disable());
    }

    warnOnlySecurity(): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.warnOnly());
    }

    addExemption(pattern: string): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.addExemption(pattern));
    }

    removeExemption(pattern: string): Promise<SecurityPolicy> {
        return this.policyLock.write(() => this.policyStore.removeExemption(pattern));
    }

    async securityStatus(): Promise<string> {
        return statusText(await this.getPolicy());
    }

    // ─── Internals ───────────────────────────────────────────

    private assertEnabled(): void {
        if (!this.env.isEnabled()) {
            throw new FeatureDisabledError();
        }
    }

    private async resolve(name: string): Promise<CommandDefinition> {
        this.assertEnabled();
        const definition = await this.cache.get(name);
        if (!definition) {
            throw new NotFoundError(name);
        }
        return definition;
    }

    private expander(): CommandExpander {
        return new CommandExpander({
            cwd: this.env.cwd(),
            shellTimeoutMs: this.config.expansion.shellTimeoutMs,
            maxFileBytes: this.config.expansion.maxFileBytes,
            logger: this.logger,
            runShell: this.runShell,
        });
    }
}
