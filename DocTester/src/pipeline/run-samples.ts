/**
 * The per-sample loop: one sandbox per sample, strictly sequential.
 */

import { Logger } from '@doctester/shared/Utils/logger.js';
import type { SampleRunner } from '../runner/runner.js';
import type { SandboxManager } from '../sandbox/environment.js';
import { failedResult } from '../samples/sample.js';
import type { CodeSample, TestResult } from '../samples/types.js';

const logger = new Logger('doctester:pipeline');

export interface RunSamplesOptions {
  /** Called after each sample, in order */
  onResult?: (result: TestResult, index: number, total: number) => void;
}

/**
 * Run every sample in extraction order. A sample that throws (sandbox setup
 * included) becomes a failed result; the batch always completes.
 */
export async function runSamples(
  samples: readonly CodeSample[],
  runner: SampleRunner,
  sandbox: SandboxManager,
  options: RunSamplesOptions = {},
): Promise<TestResult[]> {
  const results: TestResult[] = [];

  for (const [index, sample] of samples.entries()) {
    let result: TestResult;
    try {
      result = await sandbox.withEnvironment(sample, (environment) => runner.execute(sample, environment));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Sample ${sample.filePath}:${sample.lineNumber} failed before running`, err);
      result = failedResult(sample, message);
    }

    results.push(result);
    options.onResult?.(result, index, samples.length);
  }

  return results;
}
