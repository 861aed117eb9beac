/**
 * Base error class for the doc sample tester.
 * Carries a stable machine-readable code and optional details.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration-related errors (bad env vars, invalid descriptor files, unknown dialects)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Sandbox setup errors (temp directory or mock file could not be created)
 */
export class SandboxError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'SANDBOX_ERROR', details);
    this.name = 'SandboxError';
  }
}

/**
 * A child process could not be started at all (missing binary, bad cwd)
 */
export class ProcessLaunchError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROCESS_LAUNCH_ERROR', details);
    this.name = 'ProcessLaunchError';
  }
}
