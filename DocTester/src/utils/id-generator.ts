/**
 * Sandbox directory names built on Node's crypto.
 */

import { randomUUID } from 'node:crypto';

export function generateSandboxId(): string {
  return `sbx_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
