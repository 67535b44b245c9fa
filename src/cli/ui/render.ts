import chalk from 'chalk';
import { FeatureDisabledError, isCommandError } from '../../commands/errors.js';
import type { CommandSummary, PreviewReport } from '../../commands/types.js';
import { levelLabel } from '../../security/policy-store.js';
import type { SecurityPolicy } from '../../security/types.js';

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`  ✗ ${message}`));
}

/**
 * Commands grouped by namespace, with scope markers
 */
export function renderCommandList(commands: readonly CommandSummary[], conflicts: readonly string[] = []): void {
    console.log(chalk.bold(`\n⚡ Custom Commands (${commands.length})\n`));

    const groups = new Map<string, CommandSummary[]>();
    for (const cmd of commands) {
        const key = cmd.namespace ?? 'General';
        groups.set(key, [...(groups.get(key) ?? []), cmd]);
    }

    for (const namespace of [...groups.keys()].sort()) {
        console.log(chalk.cyan.bold(`  ${namespace}`));
        for (const cmd of groups.get(namespace) ?? []) {
            const hint = cmd.argumentHint ? chalk.dim(` ${cmd.argumentHint}`) : '';
            const scope = chalk.dim(cmd.scope === 'project' ? ' (project)' : ' (user)');
            const phase = cmd.phase ? chalk.magenta(` [${cmd.phase}]`) : '';
            console.log(`    ${chalk.white.bold('/' + cmd.name)}${hint}${scope}${phase}`);
            if (cmd.description) {
                console.log(`      ${cmd.description}`);
            }
        }
        console.log();
    }

    for (const name of conflicts) {
        console.log(chalk.yellow(`  ⚠ /${name} shadows a built-in command`));
    }
}

export function renderPreview(report: PreviewReport): void {
    console.log(chalk.bold(`\n🔍 Preview of /${report.commandName}\n`));

    if (report.shellSnippets.length > 0) {
        console.log(chalk.cyan('  Shell snippets:'));
        for (const snippet of report.shellSnippets) {
            console.log(`    → ${chalk.white(snippet)}`);
        }
    }

    if (report.fileReferences.length > 0) {
        console.log(chalk.cyan('  File references:'));
        for (const ref of report.fileReferences) {
            console.log(`    → ${chalk.white(ref)}`);
        }
    }

    if (report.findings.length > 0) {
        const color = report.blocked ? chalk.red : chalk.yellow;
        console.log(color('  Security findings:'));
        for (const finding of report.findings) {
            console.log(color(`    ⚠ ${finding}`));
        }
    }

    const status = report.blocked ? chalk.red('blocked') : chalk.green('allowed');
    console.log(chalk.dim(`\n  Status: `) + status + chalk.dim(` │ estimated ${report.estimatedMs}ms`));
    renderSeparator();
    console.log(report.processedContent);
    renderSeparator();
}

export function renderPolicy(policy: SecurityPolicy): void {
    const color = policy.level === 'enforce' ? chalk.green : policy.level === 'warn' ? chalk.yellow : chalk.red;
    console.log(`\n  🛡️  Security validation: ${color.bold(levelLabel(policy.level))}`);

    if (policy.exemptedPatterns.length === 0) {
        console.log(chalk.dim('  No exempted patterns'));
    } else {
        console.log(chalk.dim('  Exempted patterns:'));
        for (const pattern of policy.exemptedPatterns) {
            console.log(`    • ${pattern}`);
        }
    }
    console.log();
}

/**
 * Print a failure and exit. A disabled feature is a notice, not a failure.
 */
export function exitWithError(err: unknown): never {
    if (err instanceof FeatureDisabledError) {
        console.log(chalk.yellow(`  ${err.userMessage()}`));
        process.exit(0);
    }
    renderError(isCommandError(err) ? err.userMessage() : err instanceof Error ? err.message : String(err));
    process.exit(1);
}
