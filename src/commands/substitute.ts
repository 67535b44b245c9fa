import { shellJoin } from '../utils/shell-words.js';

const ARGUMENTS_PLACEHOLDER = '$ARGUMENTS';

// `$10` is tried before `$1`
const PLACEHOLDER = /\$ARGUMENTS|\$(10|[1-9])/g;

export function argumentBlock(joined: string): string {
    return `\n\n---\n\n**Command arguments:**\n\`\`\`\n${joined}\n\`\`\`\n\nPlease take the above arguments into account.`;
}

/**
 * Replace `$ARGUMENTS` and `$1`…`$10` in one pass. Missing positionals become
 * empty. When the body has no `$ARGUMENTS` the arguments are appended as a
 * block so none is dropped.
 */
export function substituteArguments(body: string, args: readonly string[]): string {
    const joined = shellJoin(args);
    const hasCatchAll = body.includes(ARGUMENTS_PLACEHOLDER);

    const substituted = body.replace(PLACEHOLDER, (_token: string, position: string | undefined) => {
        if (position === undefined) return joined;
        return args[Number(position) - 1] ?? '';
    });

    if (!hasCatchAll && args.length > 0) {
        return substituted + argumentBlock(joined);
    }
    return substituted;
}
