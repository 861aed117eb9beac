import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load .env from the package root if one exists. Loaded quietly so dotenv
 * never writes its banner into the CLI's stdout summary.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to the package root (default: 1 for src/index.ts)
 * @returns true when a .env file was found and loaded
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): boolean {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) {
    return false;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return true;
}
