#!/usr/bin/env node
/**
 * noti - entry point
 */

import { config } from 'dotenv';
import { runCli } from './interfaces/cli.js';
import { createLogger } from './utils/logger.js';

config();

const logger = createLogger('noti');

async function main() {
  const controller = new AbortController();

  // First Ctrl+C stops reading stdin and lets in-flight sends finish; a second one exits
  const interrupt = () => {
    logger.info('Interrupted, waiting for in-flight notifications...');
    controller.abort();
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  const code = await runCli(process.argv.slice(2), { signal: controller.signal });
  process.exit(code);
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
