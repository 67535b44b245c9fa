import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { FileReadError, MetadataParseError, describeCause } from './errors.js';
import type { CommandMetadata, ParsedTemplate } from './types.js';

/**
 * Template Parser — splits a command document into frontmatter and body
 *
 * ```markdown
 * ---
 * description: Review staged changes
 * argument-hint: <focus>
 * allowed-tools: Bash(git diff:*)
 * ---
 * Review !`git diff --cached` focusing on $ARGUMENTS
 * ```
 */

// Opening `---` at offset 0, lazy block, closing `---` line at a newline or end of document
const FRONTMATTER = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n([\s\S]*))?$/;

const MARKDOWN_EXT = /\.(md|markdown)$/i;

const Scalar = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value));

const FrontmatterSchema = z.record(z.string(), z.union([Scalar, z.array(Scalar), z.null()]));

type FrontmatterValue = string | string[] | null;

type MetadataField = 'allowedInvocations' | 'argumentHint' | 'description' | 'model';

const FIELD_ALIASES = new Map<string, MetadataField>([
    ['allowed-tools', 'allowedInvocations'],
    ['allowed_tools', 'allowedInvocations'],
    ['allowed_invocations', 'allowedInvocations'],
    ['allowed-invocations', 'allowedInvocations'],
    ['argument-hint', 'argumentHint'],
    ['argument_hint', 'argumentHint'],
    ['description', 'description'],
    ['model', 'model'],
]);

export function isMarkdownFile(filePath: string): boolean {
    return MARKDOWN_EXT.test(filePath);
}

/**
 * Parse a template document. Pure; `sourcePath` is used in error messages only.
 */
export function parseTemplate(raw: string, sourcePath: string): ParsedTemplate {
    const text = raw.trim();
    const match = FRONTMATTER.exec(text);

    if (!match) {
        return { body: text };
    }

    const block = match[1] ?? '';
    const body = (match[2] ?? '').trim();

    if (block.trim() === '') {
        return { body };
    }

    let data: unknown;
    try {
        data = parseYaml(block);
    } catch (err) {
        throw new MetadataParseError(sourcePath, describeCause(err), err);
    }

    if (data === null || data === undefined) {
        return { body };
    }

    const result = FrontmatterSchema.safeParse(data);
    if (!result.success) {
        const detail = Array.isArray(data) || typeof data !== 'object'
            ? 'expected a key/value mapping'
            : result.error.issues.map(issue => `'${issue.path.join('.')}' ${issue.message.toLowerCase()}`).join('; ');
        throw new MetadataParseError(sourcePath, detail);
    }

    return { metadata: toMetadata(result.data, sourcePath), body };
}

export async function parseTemplateFile(filePath: string): Promise<ParsedTemplate> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (err) {
        throw new FileReadError(filePath, err);
    }
    return parseTemplate(content, filePath);
}

/** File stem used as the command name */
export function commandNameFromPath(filePath: string): string {
    return path.basename(filePath).replace(MARKDOWN_EXT, '');
}

function toMetadata(fields: Record<string, FrontmatterValue>, sourcePath: string): CommandMetadata {
    const metadata: CommandMetadata = { classification: {} };

    for (const [key, value] of Object.entries(fields)) {
        if (value === null) continue;

        const field = FIELD_ALIASES.get(key.toLowerCase());
        if (field === 'allowedInvocations') {
            metadata.allowedInvocations = Array.isArray(value)
                ? value.map(v => v.trim()).filter(Boolean)
                : splitGrants(value);
            continue;
        }

        if (field) {
            if (Array.isArray(value)) {
                throw new MetadataParseError(sourcePath, `'${key}' must be a single value`);
            }
            metadata[field] = value;
            continue;
        }

        metadata.classification[key] = Array.isArray(value) ? value.join(', ') : value;
    }

    return metadata;
}

/**
 * Split `Bash(git add:*), Bash(git commit:*)` on commas outside parentheses
 */
export function splitGrants(value: string): string[] {
    const grants: string[] = [];
    let depth = 0;
    let current = '';

    for (const ch of value) {
        if (ch === '(') depth++;
        if (ch === ')' && depth > 0) depth--;
        if (ch === ',' && depth === 0) {
            grants.push(current);
            current = '';
            continue;
        }
        current += ch;
    }
    grants.push(current);

    return grants.map(g => g.trim()).filter(Boolean);
}
