/**
 * Descriptor-driven pattern checks on the raw sample text.
 */

import type { ValidationRule } from '../descriptors/schema.js';
import type { CodeSample, ValidationResults } from '../samples/types.js';

/**
 * Every rule is evaluated. A rule passes when finding its pattern matches
 * its `expected` flag.
 */
export function validateSample(sample: CodeSample, rules: readonly ValidationRule[]): ValidationResults {
  const results: Record<string, boolean> = {};
  for (const rule of rules) {
    const found = new RegExp(rule.check).test(sample.code);
    results[rule.name] = found === rule.expected;
  }
  return results;
}
