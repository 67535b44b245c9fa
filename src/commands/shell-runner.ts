import { execFile, type ExecFileException } from 'node:child_process';
import { ExecutionError, TimeoutError } from './errors.js';

/** Cap on captured stdout/stderr per snippet */
export const MAX_BUFFER = 1024 * 1024;

export interface ShellRunOptions {
    cwd: string;
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface ShellResult {
    stdout: string;
    stderr: string;
}

/** Runs one snippet; rejects with ExecutionError or TimeoutError */
export type ShellRunner = (command: string, options: ShellRunOptions) => Promise<ShellResult>;

function shellInvocation(command: string): [string, string[]] {
    if (process.platform === 'win32') {
        return ['cmd.exe', ['/d', '/s', '/c', command]];
    }
    return ['/bin/sh', ['-c', command]];
}

/**
 * Execute a snippet through the platform shell with stdin closed
 */
export const runShell: ShellRunner = (command, { cwd, timeoutMs, signal }) => {
    const [file, args] = shellInvocation(command);

    return new Promise<ShellResult>((resolve, reject) => {
        const child = execFile(
            file,
            args,
            {
                cwd,
                timeout: timeoutMs,
                signal,
                maxBuffer: MAX_BUFFER,
                windowsHide: true,
                env: { ...process.env, SLASHMD_CWD: cwd },
            },
            (err, stdout, stderr) => {
                if (err) {
                    reject(toShellError(command, err, stderr, timeoutMs, signal));
                    return;
                }
                resolve({ stdout, stderr });
            }
        );
        child.stdin?.end();
    });
};

function toShellError(
    command: string,
    err: ExecFileException,
    stderr: string,
    timeoutMs: number,
    signal: AbortSignal | undefined
): ExecutionError | TimeoutError {
    if (signal?.aborted || err.name === 'AbortError') {
        return new ExecutionError(command, 'cancelled', stderr.trim(), { cause: err });
    }
    if (err.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
        return new ExecutionError(command, `output exceeded ${MAX_BUFFER} bytes`, '', { cause: err });
    }
    if (err.killed && err.signal === 'SIGTERM') {
        return new TimeoutError(command, timeoutMs);
    }
    if (typeof err.code === 'number') {
        return new ExecutionError(command, `exited with code ${err.code}`, stderr.trim(), { cause: err });
    }
    return new ExecutionError(command, err.message, stderr.trim(), { cause: err });
}
