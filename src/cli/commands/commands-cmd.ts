import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import type { CustomCommands } from '../../commands/integration.js';
import { loadCustomCommands } from '../context.js';
import { exitWithError, renderCommandList, renderPreview } from '../ui/render.js';
import { withSpinner } from '../ui/spinner.js';

type Load = () => Promise<CustomCommands>;

export function createCommandsCommand(load: Load = loadCustomCommands): Command {
    const cmd = new Command('commands')
        .description('List, inspect and run custom commands');

    // ─── List ───
    cmd.command('list')
        .description('List all available custom commands')
        .action(async () => {
            try {
                const commands = await load();
                const summaries = await commands.list();

                if (summaries.length === 0) {
                    const dir = path.relative(process.cwd(), commands.projectDir) || '.';
                    console.log(chalk.dim('No custom commands found.'));
                    console.log(chalk.dim(`\nCreate commands in ${chalk.white(dir + '/')}`));
                    console.log(chalk.dim('Each .md file becomes a /command named after the file.\n'));
                    console.log(chalk.dim(`Run ${chalk.white('slashmd commands init')} for an example.`));
                    return;
                }

                renderCommandList(summaries, await commands.conflicts(summaries));
                console.log(chalk.dim(`  Run with: ${chalk.white('slashmd commands run <name> [args...]')}\n`));
            } catch (err) {
                exitWithError(err);
            }
        });

    // ─── Show ───
    cmd.command('show')
        .description('Show help for one command, or all of them')
        .argument('[name]', 'Command name')
        .action(async (name: string | undefined) => {
            try {
                const commands = await load();
                console.log(await commands.show(name));
            } catch (err) {
                exitWithError(err);
            }
        });

    // ─── Preview ───
    cmd.command('preview')
        .description('Show what a command would run and inline, without running it')
        .argument('<name>', 'Command name')
        .argument('[args...]', 'Command arguments')
        .action(async (name: string, args: string[]) => {
            try {
                const commands = await load();
                renderPreview(await commands.preview(name, args));
            } catch (err) {
                exitWithError(err);
            }
        });

    // ─── Run ───
    cmd.command('run')
        .description('Expand a command and print the resulting prompt')
        .argument('<name>', 'Command name')
        .argument('[args...]', 'Command arguments')
        .action(async (name: string, args: string[]) => {
            const controller = new AbortController();
            const onInterrupt = () => controller.abort();
            process.once('SIGINT', onInterrupt);

            try {
                const commands = await load();
                const text = await withSpinner(`Expanding /${name}`, `Expanded /${name}`, () =>
                    commands.expand(name, args, { signal: controller.signal })
                );
                process.stdout.write(text + '\n');
            } catch (err) {
                exitWithError(err);
            } finally {
                process.off('SIGINT', onInterrupt);
            }
        });

    // ─── Init ───
    cmd.command('init')
        .description('Create the project command directory with an example')
        .action(async () => {
            try {
                const commands = await load();
                const result = await commands.init();
                const rel = path.relative(process.cwd(), result.dir) || '.';

                if (!result.created) {
                    console.log(chalk.dim(`  ${rel}/ already exists, nothing written`));
                    return;
                }

                console.log(chalk.green('  ✓ Created ') + chalk.dim(rel + '/'));
                for (const file of result.files) {
                    console.log(chalk.green('  ✓ Created ') + chalk.dim(path.relative(process.cwd(), file)));
                }
                console.log(chalk.dim(`\n  Try it: ${chalk.white('slashmd commands run sample-command recursion')}\n`));
            } catch (err) {
                exitWithError(err);
            }
        });

    return cmd;
}
