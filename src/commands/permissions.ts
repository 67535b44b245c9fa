/**
 * Permission grants from `allowed-tools` frontmatter
 *
 *   Bash                → any shell snippet
 *   Bash(git status:*)  → snippets starting with `git status`
 *   Bash(git status)    → exactly `git status`
 */

export type Grant =
    | { tool: string; kind: 'all' }
    | { tool: string; kind: 'prefix'; prefix: string }
    | { tool: string; kind: 'exact'; command: string };

const GRANT = /^([A-Za-z_][\w.-]*)\s*(?:\(([\s\S]*)\))?$/;

export function parseGrant(raw: string): Grant {
    const match = GRANT.exec(raw.trim());
    if (!match) {
        return { tool: raw.trim(), kind: 'exact', command: raw.trim() };
    }

    const tool = match[1];
    const inner = match[2]?.trim();
    if (inner === undefined || inner === '' || inner === '*') {
        return { tool, kind: 'all' };
    }
    if (inner.endsWith(':*')) {
        return { tool, kind: 'prefix', prefix: inner.slice(0, -2).trim() };
    }
    return { tool, kind: 'exact', command: inner };
}

export function isShellTool(tool: string): boolean {
    return /bash|shell/i.test(tool);
}

export function grantsShell(grants: readonly string[] | undefined): boolean {
    return (grants ?? []).some(g => isShellTool(parseGrant(g).tool));
}

function matchesGrant(command: string, grant: Grant): boolean {
    switch (grant.kind) {
        case 'all':
            return true;
        case 'prefix':
            if (command === grant.prefix) return true;
            return command.startsWith(grant.prefix) && /\s/.test(command.charAt(grant.prefix.length));
        case 'exact':
            return command === grant.command;
    }
}

/**
 * With no grant list every snippet may run. With a non-empty list a snippet
 * needs a matching shell grant.
 */
export function isSnippetAllowed(snippet: string, grants: readonly string[] | undefined): boolean {
    if (!grants || grants.length === 0) return true;

    const command = snippet.trim();
    return grants
        .map(parseGrant)
        .filter(g => isShellTool(g.tool))
        .some(g => matchesGrant(command, g));
}
