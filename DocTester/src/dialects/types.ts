/**
 * The contract every language variant fulfils. Variants are registered by
 * name in ./registry.ts and looked up from the language descriptor.
 */

import type { LanguageDescriptor } from '../descriptors/schema.js';
import type { ProcessCommand } from '../executor/types.js';
import type { AnalysisCheck } from '../runner/analyzer.js';
import type { RewriteProfile } from '../rewrite/pipeline.js';
import type { CodeSample, ExecutionEnvironment, SampleType } from '../samples/types.js';

export type RunMode = 'execute' | 'analyze';

export interface ExtractionProfile {
  /** Accepted fence info labels, e.g. ["python", "py"] */
  fenceLabels: readonly string[];
  /** Blocks shorter than this (after trimming) are dropped */
  minLength: number;
  commentPrefixes: readonly string[];
  /** At least one must appear for the block to count as a library sample */
  libraryMarkers: readonly string[];
  libraryMarkersIgnoreCase: boolean;
  /** Tokens that betray another language sharing the fence label */
  foreignMarkers: readonly string[];
  classify(code: string): SampleType;
  extractImports(code: string): string[];
  credentialKeywords: readonly string[];
  /** Compared case-insensitively */
  mediaKeywords: readonly string[];
}

export interface MaterializeContext {
  sample: CodeSample;
  environment: ExecutionEnvironment;
  descriptor: LanguageDescriptor;
}

export interface LaunchPlan {
  /** Best-effort steps (dependency restore); failure or timeout is only logged */
  setup: readonly ProcessCommand[];
  run: ProcessCommand;
  /** Extra variables for setup and run, applied over the sandbox's own */
  env: Readonly<Record<string, string>>;
}

export interface Dialect {
  readonly name: string;
  readonly defaultMode: RunMode;
  readonly extraction: ExtractionProfile;
  readonly rewrite: RewriteProfile;
  /** Static catalogue; only dialects that carry one can run in analyze mode */
  readonly analysis?: readonly AnalysisCheck[];
  /** Write the rewritten program (and any project files) into the sandbox */
  materialize(program: string, context: MaterializeContext): Promise<LaunchPlan>;
}
