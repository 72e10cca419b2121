#!/usr/bin/env node

import { createCLI, withDefaultCommand } from '../src/cli/index.js';

const program = createCLI();

program.parseAsync(withDefaultCommand(process.argv)).catch((err: unknown) => {
    console.error('promptdeck failed:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
