import { inferNamespace, type CommandDefinition, type CommandSummary } from './types.js';

const PREVIEW_CHARS = 200;

const SCOPE_TAG = { project: '(project)', global: '(user)' } as const;

/**
 * Detailed help for one command
 */
export function formatCommandHelp(command: CommandDefinition): string {
    const lines = [`📝 Custom command: /${command.name}`];
    const meta = command.metadata;

    if (meta?.description) lines.push(`📋 Description: ${meta.description}`);
    if (meta?.argumentHint) lines.push(`💡 Usage: /${command.name} ${meta.argumentHint}`);
    if (meta?.classification['phase']) lines.push(`🔄 Phase: ${meta.classification['phase']}`);
    if (meta?.classification['dependencies']) lines.push(`🔗 Dependencies: ${meta.classification['dependencies']}`);
    if (meta?.model) lines.push(`🤖 Model: ${meta.model}`);

    lines.push(`📁 Source: ${command.sourcePath}`);
    lines.push(`🌐 Scope: ${command.scope}`);

    const namespace = command.namespace ?? inferNamespace(command.name);
    if (namespace) lines.push(`🏷️  Namespace: ${namespace}`);

    const chars = Array.from(command.body);
    const preview = chars.length > PREVIEW_CHARS
        ? `${chars.slice(0, PREVIEW_CHARS).join('')}...`
        : command.body;

    lines.push('', '📄 Content preview:', preview);
    return lines.join('\n');
}

/**
 * All commands grouped by namespace, `General` for those without one
 */
export function formatCommandList(commands: readonly CommandSummary[], projectDir = '.slashmd/commands'): string {
    if (commands.length === 0) {
        return `No custom commands available. Create .md files in ${projectDir}/ to add custom commands.`;
    }

    const groups = new Map<string, CommandSummary[]>();
    for (const cmd of commands) {
        const key = cmd.namespace ?? 'General';
        const group = groups.get(key) ?? [];
        group.push(cmd);
        groups.set(key, group);
    }

    const lines = ['🎯 Available custom commands:', ''];
    for (const namespace of [...groups.keys()].sort()) {
        lines.push(`## ${namespace} commands`, '');
        for (const cmd of groups.get(namespace) ?? []) {
            const hint = cmd.argumentHint ? ` ${cmd.argumentHint}` : '';
            const description = cmd.description ? ` - ${cmd.description}` : '';
            lines.push(`  /${cmd.name}${hint} ${SCOPE_TAG[cmd.scope]}${description}`);
        }
        lines.push('');
    }

    lines.push(`💡 Use 'slashmd commands show <name>' for detailed help on a command.`);
    return lines.join('\n');
}
