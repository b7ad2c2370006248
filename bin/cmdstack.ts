#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('cmdstack failed:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
