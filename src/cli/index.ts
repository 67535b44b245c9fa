import { Command } from 'commander';
import { createCommandsCommand } from './commands/commands-cmd.js';
import { createSecurityCommand } from './commands/security-cmd.js';

export const VERSION = '0.3.0';

export function createCLI(): Command {
    const program = new Command('slashmd')
        .description('Expand markdown slash-command templates into prompt text')
        .version(VERSION);

    program.addCommand(createCommandsCommand());
    program.addCommand(createSecurityCommand());

    return program;
}
