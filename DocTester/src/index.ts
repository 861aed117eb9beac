/**
 * Doc sample tester entry point.
 */

import { loadEnvSafely } from '@doctester/shared/Utils/env.js';
import { Logger } from '@doctester/shared/Utils/logger.js';
import { runCli } from './cli.js';
import { registerBuiltinDialects } from './dialects/registry.js';

const logger = new Logger('doctester');

async function main(): Promise<void> {
  loadEnvSafely(import.meta.url);
  registerBuiltinDialects();
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
