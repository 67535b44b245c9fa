import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import {
    CommandError,
    ExecutionError,
    FileReferenceError,
    SecurityError,
    describeCause,
    type ExpansionStage,
} from './errors.js';
import {
    findFileReferences,
    findLiteralFileReferences,
    findShellMarkers,
    isUnsafeReference,
    spliceMarkers,
} from './markers.js';
import { isSnippetAllowed } from './permissions.js';
import { runShell as defaultRunShell, type ShellRunner } from './shell-runner.js';
import { substituteArguments } from './substitute.js';
import type { CommandDefinition, PreviewReport } from './types.js';
import { fileReferenceMessage } from '../security/patterns.js';
import type { SecurityPolicy } from '../security/types.js';
import { validate } from '../security/validator.js';
import { isNotFound } from '../utils/paths.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const REASONING_KEYWORDS = [
    'think through',
    'reason about',
    'analyze carefully',
    'consider deeply',
    'extended thinking',
    'step by step',
    'break down',
    'reasoning process',
] as const;

export const REASONING_MARKER = '[Extended thinking requested]\n\n';

export interface ExpanderOptions {
    /** Directory shell snippets run in and `@path` references resolve against */
    cwd: string;
    shellTimeoutMs?: number;
    maxFileBytes?: number;
    logger?: Logger;
    runShell?: ShellRunner;
}

export interface ExpandOptions {
    signal?: AbortSignal;
}

export function requestsReasoning(text: string): boolean {
    const lower = text.toLowerCase();
    return REASONING_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function fence(content: string): string {
    return `\`\`\`\n${content.replace(/\r?\n$/, '')}\n\`\`\``;
}

/**
 * Expansion Engine — turns a command definition plus call arguments into
 * prompt text
 *
 * Pipeline: validate → substitute → shell → files → reasoning marker.
 * Shell output and inlined files are never rescanned for markers.
 */
export class CommandExpander {
    private readonly cwd: string;
    private readonly shellTimeoutMs: number;
    private readonly maxFileBytes: number;
    private readonly logger: Logger;
    private readonly runShell: ShellRunner;

    constructor(options: ExpanderOptions) {
        this.cwd = options.cwd;
        this.shellTimeoutMs = options.shellTimeoutMs ?? 30_000;
        this.maxFileBytes = options.maxFileBytes ?? 1024 * 1024;
        this.logger = options.logger ?? silentLogger;
        this.runShell = options.runShell ?? defaultRunShell;
    }

    async expand(
        definition: CommandDefinition,
        args: readonly string[],
        policy: SecurityPolicy,
        options: ExpandOptions = {}
    ): Promise<string> {
        const { signal } = options;
        let stage: ExpansionStage = 'validated';

        try {
            this.checkAborted(definition, signal);
            const outcome = validate(definition.body, policy);
            if (outcome.error) {
                throw new SecurityError(definition.name, outcome.findings);
            }
            if (outcome.warn) {
                this.logger.warn(`/${definition.name}: ${outcome.findings.join('; ')}`);
            }

            stage = 'substituted';
            const substituted = substituteArguments(definition.body, args);

            stage = 'shell-resolved';
            const outputs = await this.resolveShell(definition, substituted, policy, signal);

            stage = 'file-resolved';
            const expanded = await this.resolveFiles(definition, substituted, outputs, signal);

            stage = 'reasoning-tagged';
            const result = requestsReasoning(expanded) ? REASONING_MARKER + expanded : expanded;

            stage = 'done';
            return result;
        } catch (err) {
            if (err instanceof CommandError && err.stage === undefined) {
                err.stage = stage;
            }
            throw err;
        }
    }

    /**
     * What `expand` would do, without running snippets or reading files
     */
    preview(definition: CommandDefinition, args: readonly string[], policy: SecurityPolicy): PreviewReport {
        const processedContent = substituteArguments(definition.body, args);
        const shellSnippets = findShellMarkers(processedContent).map(m => m.command);
        const fileReferences = findFileReferences(processedContent);

        const outcome = validate(processedContent, policy);
        const findings = [...outcome.findings];

        const unsafe = fileReferences.filter(isUnsafeReference);
        for (const ref of unsafe) {
            const message = fileReferenceMessage(ref);
            if (!findings.includes(message)) findings.push(message);
        }

        const grants = definition.metadata?.allowedInvocations;
        const denied = shellSnippets.filter(snippet => !isSnippetAllowed(snippet, grants));
        for (const snippet of denied) {
            findings.push(`Shell snippet not permitted by allowed-tools: ${snippet}`);
        }

        return {
            commandName: definition.name,
            processedContent,
            shellSnippets,
            fileReferences,
            findings,
            blocked: outcome.error || unsafe.length > 0 || denied.length > 0,
            estimatedMs: 100 + 500 * shellSnippets.length + 50 * fileReferences.length,
        };
    }

    private async resolveShell(
        definition: CommandDefinition,
        text: string,
        policy: SecurityPolicy,
        signal: AbortSignal | undefined
    ): Promise<string[]> {
        const markers = findShellMarkers(text);
        const outputs: string[] = [];
        const grants = definition.metadata?.allowedInvocations;

        for (const { command } of markers) {
            this.checkAborted(definition, signal);

            if (!isSnippetAllowed(command, grants)) {
                throw new ExecutionError(command, `not permitted by allowed-tools of /${definition.name}`);
            }

            const outcome = validate(command, policy);
            if (outcome.error) {
                throw new SecurityError(definition.name, outcome.findings);
            }

            this.logger.debug(`/${definition.name}: running ${command}`);
            const { stdout } = await this.runShell(command, {
                cwd: this.cwd,
                timeoutMs: this.shellTimeoutMs,
                signal,
            });
            outputs.push(stdout.trim());
        }

        return outputs;
    }

    /**
     * Inline `@path` references outside shell markers, then splice the shell
     * outputs into the same pass
     */
    private async resolveFiles(
        definition: CommandDefinition,
        text: string,
        outputs: readonly string[],
        signal: AbortSignal | undefined
    ): Promise<string> {
        const contents = new Map<string, string>();

        for (const ref of findLiteralFileReferences(text)) {
            this.checkAborted(definition, signal);

            if (isUnsafeReference(ref)) {
                throw new SecurityError(definition.name, [fileReferenceMessage(ref)]);
            }
            contents.set(ref, await this.readReference(ref));
        }

        return spliceMarkers(text, outputs, ref => {
            const content = contents.get(ref);
            return content === undefined ? undefined : fence(content);
        });
    }

    private async readReference(ref: string): Promise<string> {
        const fullPath = path.resolve(this.cwd, ref);

        let size: number;
        try {
            const info = await stat(fullPath);
            if (!info.isFile()) {
                throw new FileReferenceError(ref, 'not a regular file');
            }
            size = info.size;
        } catch (err) {
            if (err instanceof FileReferenceError) throw err;
            if (isNotFound(err)) throw new FileReferenceError(ref, 'file not found', { cause: err });
            throw new FileReferenceError(ref, `unreadable (${describeCause(err)})`, { cause: err });
        }

        if (size > this.maxFileBytes) {
            throw new FileReferenceError(ref, `file is ${size} bytes, over the ${this.maxFileBytes}-byte limit`);
        }

        try {
            return await readFile(fullPath, 'utf-8');
        } catch (err) {
            throw new FileReferenceError(ref, `unreadable (${describeCause(err)})`, { cause: err });
        }
    }

    private checkAborted(definition: CommandDefinition, signal: AbortSignal | undefined): void {
        if (signal?.aborted) {
            throw new ExecutionError(`/${definition.name}`, 'cancelled');
        }
    }
}
