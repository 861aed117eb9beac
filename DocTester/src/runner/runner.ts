/**
 * Runs one sample inside a prepared sandbox.
 *
 * Two modes, fixed per language:
 * - execute: rewrite, write the program, run it as a subprocess
 * - analyze: match the raw text against the dialect's findings catalogue
 */

import { Logger } from '@doctester/shared/Utils/logger.js';
import type { LanguageDescriptor } from '../descriptors/schema.js';
import type { Dialect, LaunchPlan } from '../dialects/types.js';
import { runProcess } from '../executor/subprocess.js';
import { rewriteSample } from '../rewrite/pipeline.js';
import { createTestResult, failedResult } from '../samples/sample.js';
import type { CodeSample, ExecutionEnvironment, TestResult } from '../samples/types.js';
import { truncateOutput, type TruncateLimits } from '../utils/output-truncate.js';
import { validateSample } from '../validation/validator.js';
import { analyzeCode, formatFindings, type AnalysisCheck } from './analyzer.js';

const logger = new Logger('doctester:runner');

export const TIMEOUT_MESSAGE = 'Test execution timed out';

export type RunnerMode =
  | {
      kind: 'execute';
      timeoutMs: number;
      /** Bound on each best-effort setup step (dependency restore) */
      setupTimeoutMs: number;
      killGraceMs: number;
      output: TruncateLimits;
    }
  | {
      kind: 'analyze';
      catalogue: readonly AnalysisCheck[];
    };

export interface SampleRunnerOptions {
  dialect: Dialect;
  descriptor: LanguageDescriptor;
  mode: RunnerMode;
}

function elapsedSeconds(startTime: number): number {
  return (Date.now() - startTime) / 1000;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SampleRunner {
  private readonly dialect: Dialect;
  private readonly descriptor: LanguageDescriptor;
  private readonly mode: RunnerMode;

  constructor(options: SampleRunnerOptions) {
    this.dialect = options.dialect;
    this.descriptor = options.descriptor;
    this.mode = options.mode;
  }

  get modeKind(): RunnerMode['kind'] {
    return this.mode.kind;
  }

  execute(sample: CodeSample, environment: ExecutionEnvironment): Promise<TestResult> {
    const mode = this.mode;
    switch (mode.kind) {
      case 'execute':
        return this.runProgram(sample, environment, mode);
      case 'analyze':
        return Promise.resolve(this.analyze(sample, mode.catalogue));
    }
  }

  // ── Analyze ───────────────────────────────────────────────────────────────

  private analyze(sample: CodeSample, catalogue: readonly AnalysisCheck[]): TestResult {
    const startTime = Date.now();
    try {
      const { findings, blockingIssues } = analyzeCode(sample.code, catalogue);
      return createTestResult(sample, {
        success: !blockingIssues,
        executionTime: elapsedSeconds(startTime),
        stdout: formatFindings(findings),
        stderr: '',
        validation: { blocking_issues: blockingIssues },
        findings,
      });
    } catch (err) {
      return createTestResult(sample, {
        success: false,
        executionTime: elapsedSeconds(startTime),
        errorMessage: `Analysis error: ${messageOf(err)}`,
        validation: { analysis_error: true },
      });
    }
  }

  // ── Execute ───────────────────────────────────────────────────────────────

  private async runProgram(
    sample: CodeSample,
    environment: ExecutionEnvironment,
    mode: Extract<RunnerMode, { kind: 'execute' }>,
  ): Promise<TestResult> {
    const startTime = Date.now();
    const context = { sample, environment, descriptor: this.descriptor };

    let plan: LaunchPlan;
    try {
      const program = rewriteSample(this.dialect.rewrite, context);
      plan = await this.dialect.materialize(program, context);
    } catch (err) {
      return failedResult(sample, messageOf(err), elapsedSeconds(startTime));
    }

    const env = { ...process.env, ...environment.envVars, ...plan.env };

    for (const step of plan.setup) {
      await this.runSetupStep(step.command, step.args, environment.tempDir, env, mode);
    }

    try {
      const outcome = await runProcess({
        ...plan.run,
        cwd: environment.tempDir,
        env,
        timeoutMs: mode.timeoutMs,
        killGraceMs: mode.killGraceMs,
      });

      if (outcome.timedOut) {
        return failedResult(sample, TIMEOUT_MESSAGE, elapsedSeconds(startTime));
      }

      const success = outcome.exitCode === 0;
      return createTestResult(sample, {
        success,
        executionTime: elapsedSeconds(startTime),
        stdout: truncateOutput(outcome.stdout, mode.output),
        stderr: truncateOutput(outcome.stderr, mode.output),
        errorMessage: success ? '' : exitDescription(outcome.exitCode),
        validation: validateSample(sample, this.descriptor.validation_rules),
      });
    } catch (err) {
      return failedResult(sample, messageOf(err), elapsedSeconds(startTime));
    }
  }

  /** Failure and timeout are logged; the run goes ahead regardless. */
  private async runSetupStep(
    command: string,
    args: readonly string[],
    cwd: string,
    env: NodeJS.ProcessEnv,
    mode: Extract<RunnerMode, { kind: 'execute' }>,
  ): Promise<void> {
    const label = [command, ...args].join(' ');
    try {
      const outcome = await runProcess({
        command,
        args,
        cwd,
        env,
        timeoutMs: mode.setupTimeoutMs,
        killGraceMs: mode.killGraceMs,
      });
      if (outcome.timedOut) {
        logger.warn(`${label} timed out after ${mode.setupTimeoutMs}ms`);
      } else if (outcome.exitCode !== 0) {
        logger.warn(`${label} exited with ${outcome.exitCode}`, { stderr: outcome.stderr.slice(-500) });
      }
    } catch (err) {
      logger.warn(`${label} could not be started`, err);
    }
  }
}

function exitDescription(exitCode: number | null): string {
  return exitCode === null ? 'Process terminated by signal' : '';
}
