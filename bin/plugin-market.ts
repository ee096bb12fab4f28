#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';
import { reportError } from '../src/cli/context.js';

createCLI().parseAsync(process.argv).catch((err: unknown) => {
    reportError(err);
    process.exit(1);
});
