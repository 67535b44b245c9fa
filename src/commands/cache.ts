import type { CommandRepository } from './repository.js';
import type { CommandDefinition, CommandRoot } from './types.js';
import { describeCause } from './errors.js';
import { RwLock } from '../utils/rw-lock.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface CacheOptions {
    /** Staleness window, default 30s */
    ttlMs?: number;
    clock?: () => number;
    logger?: Logger;
}

type Edit = (definitions: Map<string, CommandDefinition>) => void;

/**
 * Command Cache — memoizes discovery for a bounded window
 *
 * Readers share a read lock; a refresh swaps the map under the write lock.
 * A failed refresh keeps the previous map; only a first load failure throws.
 * Manual `add`/`remove` edits last until the next refresh that starts after
 * them; edits made while a refresh is in flight are applied to its result.
 */
export class CommandCache {
    private definitions?: Map<string, CommandDefinition>;
    private lastRefresh = 0;
    private stale = true;
    private inflight?: Promise<void>;
    private pendingEdits?: Edit[];
    private readonly lock = new RwLock();
    private readonly ttlMs: number;
    private readonly clock: () => number;
    private readonly logger: Logger;

    constructor(
        private readonly repository: CommandRepository,
        private readonly roots: () => readonly CommandRoot[],
        options: CacheOptions = {}
    ) {
        this.ttlMs = options.ttlMs ?? 30_000;
        this.clock = options.clock ?? Date.now;
        this.logger = options.logger ?? silentLogger;
    }

    async get(name: string): Promise<CommandDefinition | undefined> {
        await this.ensureFresh();
        return this.lock.read(() => this.definitions?.get(name));
    }

    async has(name: string): Promise<boolean> {
        return (await this.get(name)) !== undefined;
    }

    async names(): Promise<string[]> {
        await this.ensureFresh();
        return this.lock.read(() => [...(this.definitions?.keys() ?? [])].sort());
    }

    async all(): Promise<CommandDefinition[]> {
        await this.ensureFresh();
        return this.lock.read(() =>
            [...(this.definitions?.values() ?? [])].sort((a, b) => a.name.localeCompare(b.name))
        );
    }

    isStale(): boolean {
        if (this.stale || !this.definitions) return true;
        return this.clock() - this.lastRefresh >= this.ttlMs;
    }

    /**
     * Force rediscovery. Concurrent callers share one discovery pass.
     */
    refresh(): Promise<void> {
        if (!this.inflight) {
            this.inflight = this.doRefresh().finally(() => {
                this.inflight = undefined;
            });
        }
        return this.inflight;
    }

    invalidate(): void {
        this.stale = true;
    }

    async add(definition: CommandDefinition): Promise<void> {
        await this.lock.write(() => {
            this.definitions ??= new Map();
            this.definitions.set(definition.name, definition);
            this.pendingEdits?.push(map => map.set(definition.name, definition));
        });
    }

    async remove(name: string): Promise<boolean> {
        return this.lock.write(() => {
            this.pendingEdits?.push(map => map.delete(name));
            return this.definitions?.delete(name) ?? false;
        });
    }

    private async doRefresh(): Promise<void> {
        const edits: Edit[] = [];
        this.pendingEdits = edits;
        try {
            const next = await this.repository.discover(this.roots());
            await this.lock.write(() => {
                for (const edit of edits) edit(next);
                this.definitions = next;
                this.lastRefresh = this.clock();
                this.stale = false;
            });
        } finally {
            this.pendingEdits = undefined;
        }
    }

    private async ensureFresh(): Promise<void> {
        if (!this.isStale()) return;

        try {
            await this.refresh();
        } catch (err) {
            if (!this.definitions) throw err;
            this.logger.warn(`Command refresh failed, keeping previous set: ${describeCause(err)}`);
            this.lastRefresh = this.clock();
            this.stale = false;
        }
    }
}
