/**
 * Subprocess invocation contract.
 */

export interface ProcessCommand {
  command: string;
  args: readonly string[];
}

export interface ProcessRequest extends ProcessCommand {
  cwd: string;
  /** Full environment for the child; callers merge overrides themselves */
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  /** SIGTERM → SIGKILL grace period once the timeout fires */
  killGraceMs?: number;
}

export interface ProcessOutcome {
  stdout: string;
  stderr: string;
  /** null when the child was ended by a signal */
  exitCode: number | null;
  durationMs: number;
  timedOut: boolean;
}
