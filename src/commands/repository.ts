import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { isMarkdownFile, commandNameFromPath, parseTemplateFile } from './parser.js';
import { grantsShell } from './permissions.js';
import { ParseError, SecurityError, describeCause } from './errors.js';
import { SCOPE_PRIORITY, type CommandDefinition, type CommandRoot, type CommandScope } from './types.js';
import { validateContent } from '../security/validator.js';
import { isNotFound } from '../utils/paths.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface RepositoryOptions {
    logger?: Logger;
}

function priority(scope: CommandScope): number {
    return SCOPE_PRIORITY.indexOf(scope);
}

/**
 * Command Repository — discovers command templates under root directories
 *
 * Layout:
 *   <root>/review.md          → /review
 *   <root>/git/commit.md      → /commit, namespace "git"
 *
 * Broken files are logged and skipped. On a name collision the project scope
 * wins over the global scope.
 */
export class CommandRepository {
    private readonly logger: Logger;

    constructor(options: RepositoryOptions = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    async discover(roots: readonly CommandRoot[]): Promise<Map<string, CommandDefinition>> {
        const perRoot = await Promise.all(roots.map(root => this.loadRoot(root)));

        const merged = new Map<string, CommandDefinition>();
        for (const definitions of perRoot) {
            for (const def of definitions.values()) {
                const existing = merged.get(def.name);
                if (!existing || priority(def.scope) < priority(existing.scope)) {
                    merged.set(def.name, def);
                }
            }
        }

        this.logger.debug(`Discovered ${merged.size} command(s) in ${roots.length} root(s)`);
        return merged;
    }

    /**
     * Load and validate one file. Throws on any error.
     */
    async loadFile(filePath: string, root: CommandRoot): Promise<CommandDefinition> {
        const { metadata, body } = await parseTemplateFile(filePath);

        const definition: CommandDefinition = Object.freeze({
            name: commandNameFromPath(filePath),
            body,
            metadata,
            scope: root.scope,
            sourcePath: path.resolve(filePath),
            namespace: namespaceFor(filePath, root.dir),
        });

        this.validate(definition);
        return definition;
    }

    /**
     * Re-resolve a single command without a full merge. Picks the file
     * discovery would: highest-priority root first, and within a root the
     * last loadable duplicate in walk order.
     */
    async reloadOne(name: string, roots: readonly CommandRoot[]): Promise<CommandDefinition | undefined> {
        const ordered = [...roots].sort((a, b) => priority(a.scope) - priority(b.scope));

        for (const root of ordered) {
            const candidates = (await walk(root.dir)).filter(f => commandNameFromPath(f) === name).reverse();
            for (const file of candidates) {
                try {
                    return await this.loadFile(file, root);
                } catch (err) {
                    this.logger.warn(`Skipping ${file}: ${describeCause(err)}`);
                }
            }
        }
        return undefined;
    }

    async listAvailableNames(roots: readonly CommandRoot[]): Promise<string[]> {
        const perRoot = await Promise.all(roots.map(root => walk(root.dir)));
        const names = new Set(perRoot.flat().map(commandNameFromPath));
        return [...names].sort();
    }

    private async loadRoot(root: CommandRoot): Promise<Map<string, CommandDefinition>> {
        const files = await walk(root.dir);
        const definitions = new Map<string, CommandDefinition>();

        for (const file of files) {
            try {
                const def = await this.loadFile(file, root);
                const previous = definitions.get(def.name);
                if (previous) {
                    this.logger.warn(
                        `Duplicate command '${def.name}' in ${root.dir}: ${def.sourcePath} replaces ${previous.sourcePath}`
                    );
                }
                definitions.set(def.name, def);
            } catch (err) {
                this.logger.warn(`Skipping ${file}: ${describeCause(err)}`);
            }
        }

        return definitions;
    }

    private validate(def: CommandDefinition): void {
        if (!def.name || /[\s/]/.test(def.name)) {
            throw new ParseError(def.sourcePath, `invalid command name '${def.name}'`);
        }
        if (!def.body.trim()) {
            throw new ParseError(def.sourcePath, 'command body is empty');
        }
        if (grantsShell(def.metadata?.allowedInvocations)) {
            try {
                validateContent(def.body, def.name);
            } catch (err) {
                if (!(err instanceof SecurityError)) throw err;
                throw new ParseError(def.sourcePath, `grants shell access but ${err.findings.join(', ')}`, {
                    cause: err,
                });
            }
        }
    }
}

/**
 * Markdown files under a directory, sorted, symlinks skipped. A missing
 * directory yields nothing.
 */
export async function walk(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
        if (isNotFound(err)) return [];
        throw err;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files: string[] = [];
    for (const entry of entries) {
        if (entry.isSymbolicLink()) continue;
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...await walk(full));
        } else if (entry.isFile() && isMarkdownFile(entry.name)) {
            files.push(full);
        }
    }
    return files;
}

export function namespaceFor(filePath: string, rootDir: string): string | undefined {
    const relative = path.relative(rootDir, path.dirname(filePath));
    if (!relative || relative === '.') return undefined;
    return relative.split(path.sep)[0];
}
