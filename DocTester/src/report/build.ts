/**
 * Turns a language's TestResults into the report structure written as JSON.
 */

import { basename } from 'node:path';
import { samplePriority } from '../samples/sample.js';
import type { Finding, SampleType, TestResult, ValidationResults } from '../samples/types.js';
import { truncateLines } from '../utils/output-truncate.js';

export interface ReportSummary {
  total: number;
  passed: number;
  failed: number;
  /** Percentage, one decimal */
  success_rate: number;
}

export interface SampleRow {
  file: string;
  line: number;
  success: boolean;
  execution_time: number;
  error: string;
}

export interface ResultRow extends SampleRow {
  type: SampleType;
  priority: string;
  validation_results: ValidationResults;
  findings?: readonly Finding[];
}

export interface TypeGroup {
  passed: number;
  failed: number;
  samples: SampleRow[];
}

export interface LanguageReport {
  language: string;
  mode: 'execute' | 'analyze';
  generated_at: string;
  summary: ReportSummary;
  by_type: Partial<Record<SampleType, TypeGroup>>;
  results: ResultRow[];
}

export const UNKNOWN_ERROR = 'Unknown error - no error message or stderr available';

/** Most useful single piece of failure text for a result. */
export function errorSummary(result: TestResult): string {
  if (result.errorMessage) {
    return result.errorMessage;
  }
  if (result.stderr.trim()) {
    return truncateLines(result.stderr);
  }
  if (result.success) {
    return '';
  }
  if (result.stdout.trim()) {
    return `No stderr, but stdout: ${result.stdout.trim().slice(0, 200)}`;
  }
  return UNKNOWN_ERROR;
}

export function successRate(passed: number, total: number): number {
  return total > 0 ? Math.round((passed / total) * 1000) / 10 : 0;
}

export interface BuildReportOptions {
  language: string;
  mode: 'execute' | 'analyze';
  priorityLevels: Readonly<Record<string, readonly string[]>>;
  now?: Date;
}

export function buildReport(results: readonly TestResult[], options: BuildReportOptions): LanguageReport {
  const byType: Partial<Record<SampleType, TypeGroup>> = {};
  const rows: ResultRow[] = [];

  for (const result of results) {
    const { sample } = result;
    const row: SampleRow = {
      file: basename(sample.filePath),
      line: sample.lineNumber,
      success: result.success,
      execution_time: result.executionTime,
      error: errorSummary(result),
    };

    const group = byType[sample.sampleType] ?? { passed: 0, failed: 0, samples: [] };
    if (result.success) group.passed++;
    else group.failed++;
    group.samples.push(row);
    byType[sample.sampleType] = group;

    rows.push({
      ...row,
      type: sample.sampleType,
      priority: samplePriority(sample, options.priorityLevels),
      validation_results: result.validation,
      ...(result.findings ? { findings: result.findings } : {}),
    });
  }

  const passed = results.filter((result) => result.success).length;
  return {
    language: options.language,
    mode: options.mode,
    generated_at: (options.now ?? new Date()).toISOString(),
    summary: {
      total: results.length,
      passed,
      failed: results.length - passed,
      success_rate: successRate(passed, results.length),
    },
    by_type: byType,
    results: rows,
  };
}

/** Blocking and advisory finding counts across a report's results. */
export function countFindings(report: LanguageReport): { blocking: number; suggestions: number } {
  let blocking = 0;
  let suggestions = 0;
  for (const row of report.results) {
    for (const finding of row.findings ?? []) {
      if (finding.blocking) blocking++;
      else suggestions++;
    }
  }
  return { blocking, suggestions };
}
