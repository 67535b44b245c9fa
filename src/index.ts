// slashmd — Public API Surface
export { createCLI } from './cli/index.js';
export { CustomCommands, parseInvocation } from './commands/integration.js';
export { CommandRepository } from './commands/repository.js';
export { CommandCache } from './commands/cache.js';
export { CommandExpander, REASONING_KEYWORDS, REASONING_MARKER } from './commands/expander.js';
export { parseTemplate, parseTemplateFile, isMarkdownFile } from './commands/parser.js';
export { substituteArguments } from './commands/substitute.js';
export { runShell } from './commands/shell-runner.js';
export { initCommandDirectory } from './commands/installer.js';
export { formatCommandHelp, formatCommandList } from './commands/help.js';
export { PolicyStore, statusText } from './security/policy-store.js';
export { scan, validate, validateContent } from './security/validator.js';
export { ConfigLoader } from './config/loader.js';
export { ConfigSchema, DEFAULT_CONFIG } from './config/schema.js';
export { ConsoleLogger, createLogger, silentLogger } from './utils/logger.js';
export { nodeEnvironment } from './utils/paths.js';
export * from './commands/errors.js';

// Types
export type {
    CommandDefinition,
    CommandMetadata,
    CommandRoot,
    CommandScope,
    CommandSummary,
    ParsedTemplate,
    PreviewReport,
} from './commands/types.js';
export type { ExpanderOptions, ExpandOptions } from './commands/expander.js';
export type { ShellRunner, ShellRunOptions, ShellResult } from './commands/shell-runner.js';
export type { InstallResult } from './commands/installer.js';
export type { CustomCommandsOptions, DispatchRequest } from './commands/integration.js';
export type { SecurityLevel, SecurityPolicy, Finding, ValidationOutcome } from './security/types.js';
export type { SlashmdConfig } from './config/schema.js';
export type { Logger, LogLevel } from './utils/logger.js';
export type { HostEnvironment } from './utils/paths.js';
