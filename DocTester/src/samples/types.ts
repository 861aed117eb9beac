/**
 * Core records passed between extraction, rewriting, execution and reporting.
 */

export const SAMPLE_TYPES = ['sync', 'async', 'streaming', 'class', 'function'] as const;

export type SampleType = (typeof SAMPLE_TYPES)[number];

/** One fenced code block pulled out of a document. Frozen on creation. */
export interface CodeSample {
  readonly filePath: string;
  /** 1-based line of the opening fence */
  readonly lineNumber: number;
  readonly code: string;
  readonly language: string;
  readonly sampleType: SampleType;
  readonly imports: readonly string[];
  readonly requiresApiKey: boolean;
  readonly requiresAudioFile: boolean;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** A disposable directory plus the variables a sample runs with. */
export interface ExecutionEnvironment {
  readonly tempDir: string;
  readonly mockFiles: readonly string[];
  /** Set when the sample needed a media file */
  readonly mockAudioPath?: string;
  readonly envVars: Readonly<Record<string, string>>;
}

/** One statically detected defect in a sample. */
export interface Finding {
  readonly issue: string;
  readonly location: string;
  readonly problem: string;
  readonly fix: string;
  readonly impact: string;
  /** True when a user copying the sample would hit a runtime failure */
  readonly blocking: boolean;
}

export type ValidationResults = Readonly<Record<string, boolean>>;

export interface TestResult {
  /** Borrowed from extraction; never copied or mutated */
  readonly sample: CodeSample;
  readonly success: boolean;
  /** Wall time in seconds */
  readonly executionTime: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly errorMessage: string;
  /**
   * Rule outcomes in execute mode. In analyze mode this holds
   * `blocking_issues` instead and `findings` is set.
   */
  readonly validation: ValidationResults;
  readonly findings?: readonly Finding[];
}
