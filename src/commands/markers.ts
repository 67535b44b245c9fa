/**
 * Template Markers — inline shell snippets and `@path` file references
 */

const SHELL_MARKER = /!`([^`]+)`/g;

// `@path` after start of text, whitespace or `>`; an e-mail address never matches
const FILE_REFERENCE = /(^|[\s>])@([A-Za-z0-9._\/-]+)/g;

// Both kinds in one alternation, so a reference inside a marker is never taken
const MARKER_OR_REFERENCE = /!`([^`]+)`|(^|[\s>])@([A-Za-z0-9._\/-]+)/g;

export interface ShellMarker {
    /** Full marker text including `!` and backticks */
    marker: string;
    command: string;
}

export function findShellMarkers(text: string): ShellMarker[] {
    return Array.from(text.matchAll(SHELL_MARKER), m => ({ marker: m[0], command: m[1] }));
}

/**
 * Split a captured reference into the path and trailing sentence punctuation
 */
function splitReference(raw: string): { ref: string; trailing: string } {
    const ref = raw.replace(/\.+$/, '');
    return { ref, trailing: raw.slice(ref.length) };
}

/** Distinct file references in document order */
export function findFileReferences(text: string): string[] {
    const refs = new Set<string>();
    for (const m of text.matchAll(FILE_REFERENCE)) {
        const { ref } = splitReference(m[2]);
        if (ref) refs.add(ref);
    }
    return [...refs];
}

/** Distinct file references outside shell markers, in document order */
export function findLiteralFileReferences(text: string): string[] {
    const refs = new Set<string>();
    for (const m of text.matchAll(MARKER_OR_REFERENCE)) {
        if (m[3] === undefined) continue;
        const { ref } = splitReference(m[3]);
        if (ref) refs.add(ref);
    }
    return [...refs];
}

/**
 * Replace shell markers by position with `outputs` and file references with
 * `render` in a single pass. Inserted text is never rescanned.
 */
export function spliceMarkers(
    text: string,
    outputs: readonly string[],
    render: (ref: string) => string | undefined
): string {
    let i = 0;
    return text.replace(
        MARKER_OR_REFERENCE,
        (whole: string, command: string | undefined, lead: string | undefined, raw: string | undefined) => {
            if (command !== undefined) {
                return outputs[i++] ?? whole;
            }
            if (raw === undefined) return whole;
            const { ref, trailing } = splitReference(raw);
            if (!ref) return whole;
            const replacement = render(ref);
            return replacement === undefined ? whole : `${lead ?? ''}${replacement}${trailing}`;
        }
    );
}

/**
 * Absolute paths and any `..` segment escape the working directory
 */
export function isUnsafeReference(ref: string): boolean {
    if (ref.startsWith('/')) return true;
    return ref.split('/').includes('..');
}
