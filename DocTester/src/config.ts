/**
 * DocTester process configuration.
 *
 * Zod-validated environment settings that sit beside the YAML descriptors:
 * where sandboxes live, where reports go, and how captured output is trimmed.
 */

import { z } from 'zod';
import { homedir, tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@doctester/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z.object({
  sandboxRoot: z.string().default(tmpdir()),
  configDir: z.string().default(fileURLToPath(new URL('../config', import.meta.url))),
  outputDir: z.string().default('test-runs'),
  maxOutputChars: z.coerce.number().int().positive().default(10_000),
  truncationHead: z.coerce.number().int().positive().default(4_000),
  truncationTail: z.coerce.number().int().positive().default(4_000),
  killGraceMs: z.coerce.number().int().positive().default(5_000),
}).refine((config) => config.truncationHead + config.truncationTail <= config.maxOutputChars, {
  message: 'truncationHead + truncationTail must not exceed maxOutputChars',
  path: ['truncationHead'],
});

export type DocTesterConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: DocTesterConfig | null = null;

export function getConfig(): DocTesterConfig {
  if (cached) return cached;

  const raw = {
    sandboxRoot: process.env.DOCTESTER_SANDBOX_ROOT,
    configDir: process.env.DOCTESTER_CONFIG_DIR,
    outputDir: process.env.DOCTESTER_OUTPUT_DIR,
    maxOutputChars: process.env.DOCTESTER_MAX_OUTPUT_CHARS,
    truncationHead: process.env.DOCTESTER_TRUNCATION_HEAD,
    truncationTail: process.env.DOCTESTER_TRUNCATION_TAIL,
    killGraceMs: process.env.DOCTESTER_KILL_GRACE_MS,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`DocTester config error: ${result.error.message}`, result.error.issues);
  }

  const config = result.data;
  config.sandboxRoot = resolve(expandHome(config.sandboxRoot));
  config.configDir = resolve(expandHome(config.configDir));
  config.outputDir = resolve(expandHome(config.outputDir));

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}
