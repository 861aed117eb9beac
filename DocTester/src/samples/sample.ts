import type { CodeSample, Finding, TestResult } from './types.js';

export function createCodeSample(fields: CodeSample): CodeSample {
  return Object.freeze({
    ...fields,
    imports: Object.freeze([...fields.imports]),
    metadata: Object.freeze({ ...fields.metadata }),
  });
}

interface ResultFields {
  success: boolean;
  executionTime: number;
  stdout?: string;
  stderr?: string;
  errorMessage?: string;
  validation?: Record<string, boolean>;
  findings?: readonly Finding[];
}

export function createTestResult(sample: CodeSample, fields: ResultFields): TestResult {
  const result: TestResult = {
    sample,
    success: fields.success,
    executionTime: fields.executionTime,
    stdout: fields.stdout ?? '',
    stderr: fields.stderr ?? '',
    errorMessage: fields.errorMessage ?? '',
    validation: Object.freeze({ ...fields.validation }),
    ...(fields.findings ? { findings: Object.freeze([...fields.findings]) } : {}),
  };
  return Object.freeze(result);
}

/** A result for a sample that never got as far as producing output. */
export function failedResult(sample: CodeSample, errorMessage: string, executionTime = 0): TestResult {
  return createTestResult(sample, { success: false, executionTime, errorMessage });
}

/**
 * First priority level whose list names the sample's type, else "medium".
 */
export function samplePriority(
  sample: CodeSample,
  priorityLevels: Readonly<Record<string, readonly string[]>>,
): string {
  for (const [priority, types] of Object.entries(priorityLevels)) {
    if (types.includes(sample.sampleType)) {
      return priority;
    }
  }
  return 'medium';
}
