/**
 * Dialect registry: language name → factory.
 *
 * Built-in dialects are added by registerBuiltinDialects(); nothing is
 * registered as an import side effect.
 */

import { ConfigurationError } from '@doctester/shared/Types/errors.js';
import { createCSharpDialect } from './csharp.js';
import { createGoDialect } from './go.js';
import { createJavaScriptDialect } from './javascript.js';
import { createPythonDialect } from './python.js';
import type { Dialect } from './types.js';

export type DialectFactory = () => Dialect;

const factories = new Map<string, DialectFactory>();

export function registerDialect(name: string, factory: DialectFactory): void {
  if (factories.has(name)) {
    throw new ConfigurationError(`Dialect "${name}" is already registered`);
  }
  factories.set(name, factory);
}

export function createDialect(name: string): Dialect {
  const factory = factories.get(name);
  if (!factory) {
    const known = registeredDialects().join(', ') || 'none';
    throw new ConfigurationError(`Unknown language "${name}" (registered: ${known})`);
  }
  return factory();
}

export function registeredDialects(): string[] {
  return [...factories.keys()].sort();
}

/** Safe to call more than once. */
export function registerBuiltinDialects(): void {
  const builtins: Record<string, DialectFactory> = {
    python: createPythonDialect,
    csharp: createCSharpDialect,
    javascript: createJavaScriptDialect,
    go: createGoDialect,
  };
  for (const [name, factory] of Object.entries(builtins)) {
    if (!factories.has(name)) factories.set(name, factory);
  }
}

/** Drop every registration (for testing) */
export function resetDialects(): void {
  factories.clear();
}
