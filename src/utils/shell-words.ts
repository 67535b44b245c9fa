const SAFE_WORD = /^[A-Za-z0-9_\/.,:=@%+-]+$/;

/**
 * Quote one word for a POSIX shell. Words made only of safe characters pass
 * through unchanged; everything else is single-quoted.
 */
export function shellQuote(word: string): string {
    if (word === '') return "''";
    if (SAFE_WORD.test(word)) return word;
    return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(words: readonly string[]): string {
    return words.map(shellQuote).join(' ');
}

export class ShellSplitError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ShellSplitError';
    }
}

/**
 * Split a line into words the way a POSIX shell would, without expansion.
 * Supports single quotes, double quotes and backslash escapes.
 */
export function shellSplit(line: string): string[] {
    const words: string[] = [];
    let current = '';
    let inWord = false;
    let i = 0;

    while (i < line.length) {
        const ch = line[i];

        if (ch === ' ' || ch === '\t' || ch === '\n') {
            if (inWord) {
                words.push(current);
                current = '';
                inWord = false;
            }
            i++;
            continue;
        }

        inWord = true;

        if (ch === "'") {
            const end = line.indexOf("'", i + 1);
            if (end === -1) throw new ShellSplitError('unterminated single quote');
            current += line.slice(i + 1, end);
            i = end + 1;
            continue;
        }

        if (ch === '"') {
            i++;
            let closed = false;
            while (i < line.length) {
                const c = line[i];
                if (c === '"') {
                    closed = true;
                    i++;
                    break;
                }
                if (c === '\\' && i + 1 < line.length && '"\\$`'.includes(line[i + 1])) {
                    current += line[i + 1];
                    i += 2;
                    continue;
                }
                current += c;
                i++;
            }
            if (!closed) throw new ShellSplitError('unterminated double quote');
            continue;
        }

        if (ch === '\\') {
            if (i + 1 >= line.length) throw new ShellSplitError('trailing backslash');
            current += line[i + 1];
            i += 2;
            continue;
        }

        current += ch;
        i++;
    }

    if (inWord) words.push(current);
    return words;
}
