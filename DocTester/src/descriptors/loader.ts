/**
 * Reads and validates descriptor files.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { ConfigurationError } from '@doctester/shared/Types/errors.js';
import {
  frameworkDescriptorSchema,
  languageDescriptorSchema,
  type FrameworkDescriptor,
  type LanguageDescriptor,
} from './schema.js';

async function loadYaml<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read descriptor ${path}`, err);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(
      `Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  // An empty file parses to null; treat it as an empty mapping
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid descriptor ${path}: ${issues}`, result.error.issues);
  }
  return result.data;
}

export function loadFrameworkDescriptor(configDir: string): Promise<FrameworkDescriptor> {
  return loadYaml(join(configDir, 'framework.yaml'), frameworkDescriptorSchema);
}

export async function loadLanguageDescriptor(
  configDir: string,
  language: string,
): Promise<LanguageDescriptor> {
  const descriptor = await loadYaml(
    join(configDir, 'languages', `${language}.yaml`),
    languageDescriptorSchema,
  );
  if (descriptor.language.name !== language) {
    throw new ConfigurationError(
      `languages/${language}.yaml declares language "${descriptor.language.name}"`,
    );
  }
  return descriptor;
}

/** Language names that have a descriptor, sorted. */
export async function listConfiguredLanguages(configDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(join(configDir, 'languages'));
  } catch {
    return [];
  }
  return entries
    .filter((entry) => extname(entry) === '.yaml')
    .map((entry) => basename(entry, '.yaml'))
    .sort();
}
