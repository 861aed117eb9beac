/**
 * One language end to end: descriptor → dialect → extraction → per-sample
 * run → report.
 */

import { join, resolve } from 'node:path';
import { ConfigurationError } from '@doctester/shared/Types/errors.js';
import { Logger } from '@doctester/shared/Utils/logger.js';
import type { DocTesterConfig } from '../config.js';
import { loadLanguageDescriptor } from '../descriptors/loader.js';
import type { FrameworkDescriptor, LanguageDescriptor } from '../descriptors/schema.js';
import { createDialect } from '../dialects/registry.js';
import type { Dialect } from '../dialects/types.js';
import { FileSystemDocumentSource, type DocumentSource } from '../extraction/documents.js';
import { extractSamples } from '../extraction/extractor.js';
import { buildReport, type LanguageReport } from '../report/build.js';
import { SampleRunner, type RunnerMode } from '../runner/runner.js';
import { SandboxManager } from '../sandbox/environment.js';
import type { TestResult } from '../samples/types.js';
import { runSamples } from './run-samples.js';

const logger = new Logger('doctester:language');

export function resolveRunnerMode(
  dialect: Dialect,
  descriptor: LanguageDescriptor,
  framework: FrameworkDescriptor,
  config: DocTesterConfig,
): RunnerMode {
  const kind = descriptor.mode ?? dialect.defaultMode;

  if (kind === 'analyze') {
    if (!dialect.analysis) {
      throw new ConfigurationError(`Language "${dialect.name}" has no analysis catalogue; use mode: execute`);
    }
    return { kind: 'analyze', catalogue: dialect.analysis };
  }

  return {
    kind: 'execute',
    timeoutMs: framework.execution.timeout_seconds * 1000,
    setupTimeoutMs: framework.execution.restore_timeout_seconds * 1000,
    killGraceMs: config.killGraceMs,
    output: {
      maxChars: config.maxOutputChars,
      head: config.truncationHead,
      tail: config.truncationTail,
    },
  };
}

export interface LanguageRunOptions {
  language: string;
  docsPath: string;
  framework: FrameworkDescriptor;
  config: DocTesterConfig;
  /** Defaults to a file-system walk of `<docsPath>/<pages_path>` */
  source?: DocumentSource;
  onResult?: (result: TestResult, index: number, total: number) => void;
}

export interface LanguageRun {
  results: TestResult[];
  report: LanguageReport;
}

export async function runLanguage(options: LanguageRunOptions): Promise<LanguageRun> {
  const { language, framework, config } = options;

  const descriptor = await loadLanguageDescriptor(config.configDir, language);
  const dialect = createDialect(language);
  const mode = resolveRunnerMode(dialect, descriptor, framework, config);

  const source =
    options.source ??
    new FileSystemDocumentSource(
      resolve(join(options.docsPath, framework.documentation.pages_path)),
      framework.documentation.extensions,
    );

  const samples = await extractSamples(source, language, dialect.extraction);
  logger.info(`Running ${samples.length} ${language} samples in ${mode.kind} mode`);

  const runner = new SampleRunner({ dialect, descriptor, mode });
  const sandbox = new SandboxManager({
    root: config.sandboxRoot,
    apiKeyPlaceholder: framework.mocking.api_key_placeholder,
    credentialVariables: framework.mocking.credential_variables,
  });

  const results = await runSamples(samples, runner, sandbox, { onResult: options.onResult });
  const report = buildReport(results, {
    language,
    mode: mode.kind,
    priorityLevels: framework.priority_levels,
  });

  return { results, report };
}
