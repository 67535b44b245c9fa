#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';

createCLI().parseAsync(process.argv).catch((err: unknown) => {
    console.error('slashmd:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
