import { Command } from 'commander';
import chalk from 'chalk';
import type { CustomCommands } from '../../commands/integration.js';
import type { SecurityPolicy } from '../../security/types.js';
import { loadCustomCommands } from '../context.js';
import { exitWithError, renderPolicy } from '../ui/render.js';

type Load = () => Promise<CustomCommands>;

export function createSecurityCommand(load: Load = loadCustomCommands): Command {
    const cmd = new Command('security')
        .description('Inspect and change the template security policy');

    const run = (action: (commands: CustomCommands) => Promise<SecurityPolicy>, done?: string) =>
        async () => {
            try {
                const policy = await action(await load());
                if (done) console.log(chalk.green(`  ✓ ${done}`));
                renderPolicy(policy);
            } catch (err) {
                exitWithError(err);
            }
        };

    cmd.command('status')
        .description('Show the active policy')
        .action(run(c => c.getPolicy()));

    cmd.command('on')
        .description('Block templates with dangerous patterns')
        .action(run(c => c.enableSecurity(), 'Security validation enabled'));

    cmd.command('warn')
        .description('Report dangerous patterns without blocking')
        .action(run(c => c.warnOnlySecurity(), 'Security validation set to warn only'));

    cmd.command('off')
        .description('Disable pattern checks (unsafe file paths stay blocked)')
        .action(run(c => c.disableSecurity(), 'Security validation disabled'));

    cmd.command('exempt')
        .description('Stop flagging a pattern, e.g. "rm -rf"')
        .argument('<pattern>', 'Pattern label or text to exempt')
        .action(async (pattern: string) => {
            await run(c => c.addExemption(pattern), `Exempted "${pattern}"`)();
        });

    cmd.command('unexempt')
        .description('Remove an exemption')
        .argument('<pattern>', 'Previously exempted pattern')
        .action(async (pattern: string) => {
            await run(c => c.removeExemption(pattern), `Removed exemption "${pattern}"`)();
        });

    return cmd;
}
