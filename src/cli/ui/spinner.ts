import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner on stderr so expanded text on stdout can be piped
 */
export class Spinner {
    private readonly spinner: Ora;
    private startedAt = 0;

    constructor() {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream: process.stderr,
        });
    }

    start(message: string): void {
        this.startedAt = Date.now();
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    /** Stop with success and the elapsed time */
    success(message: string): void {
        const secs = ((Date.now() - this.startedAt) / 1000).toFixed(1);
        this.spinner.succeed(chalk.green(`  ${message}`) + chalk.dim(` (${secs}s)`));
    }

    fail(message: string): void {
        this.spinner.fail(chalk.red(`  ${message}`));
    }
}

/**
 * Run a task under a spinner; the spinner fails with the task
 */
export async function withSpinner<T>(message: string, done: string, task: () => Promise<T>): Promise<T> {
    const spinner = new Spinner();
    spinner.start(message);
    try {
        const result = await task();
        spinner.success(done);
        return result;
    } catch (err) {
        spinner.fail(`${message} failed`);
        throw err;
    }
}
