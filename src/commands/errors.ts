/**
 * Command System — Errors
 *
 * Every failure of the resolution pipeline surfaces as a subclass of
 * CommandError. `message` is the diagnostic form (logs, JSON); `userMessage()`
 * is what a host prints to the terminal.
 */

export type CommandErrorKind =
    | 'not-found'
    | 'argument'
    | 'parse'
    | 'security'
    | 'execution'
    | 'timeout'
    | 'file-reference'
    | 'config'
    | 'disabled';

/** Pipeline stage an expansion was in when it failed */
export type ExpansionStage =
    | 'validated'
    | 'substituted'
    | 'shell-resolved'
    | 'file-resolved'
    | 'reasoning-tagged'
    | 'done';

interface CommandErrorOptions {
    cause?: unknown;
    context?: Record<string, unknown>;
}

export abstract class CommandError extends Error {
    abstract readonly kind: CommandErrorKind;
    readonly code: string;
    readonly context?: Record<string, unknown>;
    /** Set by the expansion engine when the error escapes one of its stages */
    stage?: ExpansionStage;

    constructor(code: string, message: string, options: CommandErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
        this.context = options.context;
    }

    /** Fatal errors must never be downgraded or retried by a host */
    get fatal(): boolean {
        return false;
    }

    userMessage(): string {
        return this.message;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            kind: this.kind,
            code: this.code,
            message: this.message,
            stage: this.stage,
            context: this.context,
        };
    }
}

export class NotFoundError extends CommandError {
    readonly kind = 'not-found';

    constructor(readonly commandName: string) {
        super('COMMAND_NOT_FOUND', `Custom command '${commandName}' not found`, { context: { commandName } });
    }

    override userMessage(): string {
        return `Command '${this.commandName}' was not found. Run 'slashmd commands list' to see available commands.`;
    }
}

export class ArgumentError extends CommandError {
    readonly kind = 'argument';

    constructor(readonly commandName: string, detail: string) {
        super('INVALID_ARGUMENTS', `Invalid arguments for command '${commandName}': ${detail}`, {
            context: { commandName, detail },
        });
    }
}

export class ParseError extends CommandError {
    readonly kind = 'parse';

    constructor(readonly path: string, detail: string, options: CommandErrorOptions & { code?: string } = {}) {
        super(options.code ?? 'PARSE_ERROR', `Failed to parse command file '${path}': ${detail}`, {
            ...options,
            context: { path, ...options.context },
        });
    }
}

export class MetadataParseError extends ParseError {
    constructor(path: string, detail: string, cause?: unknown) {
        super(path, `invalid frontmatter: ${detail}`, { code: 'METADATA_PARSE_ERROR', cause });
    }
}

export class FileReadError extends ParseError {
    constructor(path: string, cause: unknown) {
        super(path, `could not read file (${describeCause(cause)})`, { code: 'FILE_READ_ERROR', cause });
    }
}

export class SecurityError extends CommandError {
    readonly kind = 'security';

    constructor(readonly commandName: string, readonly findings: string[]) {
        super('SECURITY_VIOLATION', `Security violation in command '${commandName}': ${findings.join(', ')}`, {
            context: { commandName, findings },
        });
    }

    override get fatal(): boolean {
        return true;
    }

    override userMessage(): string {
        return `Command '${this.commandName}' was blocked for security reasons: ${this.findings.join('; ')}`;
    }
}

export class ExecutionError extends CommandError {
    readonly kind = 'execution';

    constructor(readonly snippet: string, detail: string, readonly stderr = '', options: CommandErrorOptions = {}) {
        super('EXECUTION_FAILED', `Failed to execute '${snippet}': ${detail}`, {
            ...options,
            context: { snippet, stderr },
        });
    }

    override userMessage(): string {
        const tail = this.stderr ? `\n${this.stderr}` : '';
        return `${this.message}${tail}`;
    }
}

export class TimeoutError extends CommandError {
    readonly kind = 'timeout';

    constructor(readonly snippet: string, readonly timeoutMs: number) {
        super('EXECUTION_TIMEOUT', `Shell snippet '${snippet}' timed out after ${timeoutMs}ms`, {
            context: { snippet, timeoutMs },
        });
    }
}

export class FileReferenceError extends CommandError {
    readonly kind = 'file-reference';

    constructor(readonly file: string, readonly detail: string, options: CommandErrorOptions = {}) {
        super('FILE_REFERENCE_ERROR', `Failed to resolve file reference '${file}': ${detail}`, {
            ...options,
            context: { file, detail },
        });
    }

    override userMessage(): string {
        return `File '${this.file}' could not be inlined (${this.detail}). Check the path is relative to the working directory.`;
    }
}

export class ConfigError extends CommandError {
    readonly kind = 'config';

    constructor(detail: string, options: CommandErrorOptions = {}) {
        super('CONFIG_ERROR', `Configuration error: ${detail}`, options);
    }

    override get fatal(): boolean {
        return true;
    }
}

export class FeatureDisabledError extends CommandError {
    readonly kind = 'disabled';

    constructor() {
        super('FEATURE_DISABLED', 'Custom commands are disabled');
    }

    override userMessage(): string {
        return 'Custom commands are disabled. Set "enabled": true in slashmd.config.json or SLASHMD_ENABLED=1.';
    }
}

export function isCommandError(err: unknown): err is CommandError {
    return err instanceof CommandError;
}

/** One-line description of an unknown thrown value */
export function describeCause(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}
