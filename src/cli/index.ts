#!/usr/bin/env node
/**
 * moo CLI - Project-aware command runner
 */

import 'dotenv/config';
import { errorMessage, logger } from '../base/utils/logger.js';
import { bootstrap } from './bootstrap.js';
import { dispatch } from './dispatcher.js';

// ============================================================================
// Main
// ============================================================================
async function main(): Promise<void> {
  const env = bootstrap(process.cwd());
  process.exitCode = await dispatch(process.argv.slice(2), env);
}

main().catch((error: unknown) => {
  logger.error('CLI', 'Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
