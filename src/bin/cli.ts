#!/usr/bin/env node

import 'dotenv/config';
import { main } from '../cli/index.js';
import { parseEnv } from '../config/env.js';
import { EXIT_CODES } from '../config/constants.js';

try {
    const env = parseEnv();
    process.exitCode = await main(process.argv, { logLevel: env.LOG_LEVEL });
} catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.FAILURE;
}
