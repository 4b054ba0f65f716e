#!/usr/bin/env node
/**
 * askai - Entry point
 */

import 'dotenv/config';
import { runCli } from './cli/app.js';
import { errorMessage } from './core/errors.js';
import { formatError } from './utils/console.js';

async function main() {
  process.exitCode = await runCli(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(errorMessage(error)));
  process.exit(1);
});
