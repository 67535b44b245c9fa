import { ConfigLoader } from '../config/loader.js';
import { CustomCommands } from '../commands/integration.js';
import { createLogger } from '../utils/logger.js';

/**
 * Build the facade from slashmd.config.json and the environment
 */
export async function loadCustomCommands(cwd: string = process.cwd()): Promise<CustomCommands> {
    const config = await new ConfigLoader().load(cwd);
    return new CustomCommands({ config, logger: createLogger(config.logLevel) });
}
