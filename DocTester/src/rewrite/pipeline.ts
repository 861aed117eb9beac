/**
 * Ordered rewrite of a sample into a program that can run unattended.
 *
 * The order is fixed: credential substitution has to land before the
 * declaration step looks for what the body needs, and wrapping has to see
 * the final body.
 */

import type { LanguageDescriptor } from '../descriptors/schema.js';
import type { CodeSample, ExecutionEnvironment } from '../samples/types.js';
import {
  applyRules,
  normalizeIndentation,
  stripMigrationNotice,
  substituteAssetUrls,
  substituteCredentialPlaceholders,
  substituteCredentialReads,
  substituteMediaPaths,
  type RewriteRule,
} from './steps.js';

export interface RewriteContext {
  sample: CodeSample;
  environment: ExecutionEnvironment;
  descriptor: LanguageDescriptor;
}

export interface Declarations {
  /** Body after optional-dependency imports were pulled out */
  code: string;
  /** Lines that must sit at module scope, ahead of everything else */
  preamble: string[];
}

export interface RewriteProfile {
  /** Multi-line comment pointing readers at a migration guide */
  migrationNotice: RegExp;
  commentPrefixes: readonly string[];
  /** Env lookups of the API key, replaced by the quoted test key */
  credentialReads: readonly RegExp[];
  /** Removed or renamed SDK symbols */
  deprecatedNames: readonly RewriteRule[];
  /** Input prompts, endless loops, sleeps, persistent connections */
  blockingOperations: readonly RewriteRule[];
  declarations(code: string, context: RewriteContext): Declarations;
  wrap(code: string, preamble: readonly string[], context: RewriteContext): string;
}

export function rewriteSample(profile: RewriteProfile, context: RewriteContext): string {
  const { sample, environment } = context;

  let code = stripMigrationNotice(sample.code, profile.migrationNotice);
  code = normalizeIndentation(code, profile.commentPrefixes);
  code = substituteCredentialPlaceholders(code);
  code = substituteCredentialReads(code, profile.credentialReads);
  code = applyRules(code, profile.deprecatedNames);
  code = applyRules(code, profile.blockingOperations);

  if (sample.requiresAudioFile && environment.mockAudioPath) {
    code = substituteMediaPaths(code, environment.mockAudioPath);
  }

  code = substituteAssetUrls(code);

  const declarations = profile.declarations(code, context);
  return profile.wrap(declarations.code, declarations.preamble, context);
}
