/**
 * Command System — Types
 *
 * Custom commands are markdown templates with optional YAML frontmatter.
 * Invoking `/name args…` expands the template body into prompt text that the
 * host hands to its chat session.
 */

export type CommandScope = 'project' | 'global';

/** Scope priority on name collision: lower index wins */
export const SCOPE_PRIORITY: readonly CommandScope[] = ['project', 'global'];

/**
 * Structured data from a template's frontmatter block
 */
export interface CommandMetadata {
    /** Permission grants: `Bash`, `Bash(git add:*)`, `Bash(git status)` */
    allowedInvocations?: string[];
    /** Usage hint shown after the command name, e.g. `<file> [id]` */
    argumentHint?: string;
    description?: string;
    /** Model the template prefers; advisory for the host */
    model?: string;
    /** Free-form display tags (phase, dependencies, output-format, …) */
    classification: Record<string, string>;
}

/**
 * A parsed, validated command template
 */
export interface CommandDefinition {
    /** File stem; unique within the merged command set */
    readonly name: string;
    /** Markdown body without the frontmatter block */
    readonly body: string;
    readonly metadata?: CommandMetadata;
    readonly scope: CommandScope;
    /** Absolute path to the source .md file */
    readonly sourcePath: string;
    /** First directory between the root and the file, if any */
    readonly namespace?: string;
}

/** A directory to discover commands in */
export interface CommandRoot {
    dir: string;
    scope: CommandScope;
}

export interface ParsedTemplate {
    metadata?: CommandMetadata;
    body: string;
}

/**
 * Listing entry for a command
 */
export interface CommandSummary {
    name: string;
    description?: string;
    argumentHint?: string;
    scope: CommandScope;
    namespace?: string;
    phase?: string;
    sourcePath: string;
}

/**
 * What an expansion would do, computed without running anything
 */
export interface PreviewReport {
    commandName: string;
    /** Body after argument substitution only */
    processedContent: string;
    shellSnippets: string[];
    fileReferences: string[];
    findings: string[];
    /** True when the active policy would refuse the expansion */
    blocked: boolean;
    estimatedMs: number;
}

export function toSummary(command: CommandDefinition): CommandSummary {
    return {
        name: command.name,
        description: command.metadata?.description,
        argumentHint: command.metadata?.argumentHint,
        scope: command.scope,
        namespace: command.namespace ?? inferNamespace(command.name),
        phase: command.metadata?.classification['phase'],
        sourcePath: command.sourcePath,
    };
}

/**
 * Display namespace inferred from the name prefix before the first hyphen
 */
export function inferNamespace(name: string): string | undefined {
    const idx = name.indexOf('-');
    if (idx <= 0) return undefined;
    return name.slice(0, idx);
}
