/**
 * Sandbox lifecycle: one fresh directory per sample, removed afterwards.
 *
 * withEnvironment() is the normal entry point; it removes the directory on
 * every exit path. prepare()/cleanup() are exposed for callers that need to
 * hold the environment across several steps.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SandboxError } from '@doctester/shared/Types/errors.js';
import { Logger } from '@doctester/shared/Utils/logger.js';
import type { CodeSample, ExecutionEnvironment } from '../samples/types.js';
import { generateSandboxId } from '../utils/id-generator.js';
import { MOCK_AUDIO_FILENAME, createWavHeader } from './mock-audio.js';

const logger = new Logger('doctester:sandbox');

export interface SandboxOptions {
  /** Parent directory for sandbox directories */
  root: string;
  /** Value every credential variable is set to */
  apiKeyPlaceholder: string;
  credentialVariables: readonly string[];
}

export class SandboxManager {
  private readonly live = new Set<string>();

  constructor(private readonly options: SandboxOptions) {}

  async prepare(sample: CodeSample): Promise<ExecutionEnvironment> {
    const tempDir = join(this.options.root, `${sample.language}-${generateSandboxId()}`);

    try {
      await mkdir(this.options.root, { recursive: true });
      await mkdir(tempDir);
    } catch (err) {
      throw new SandboxError(
        `Failed to create sandbox directory ${tempDir}: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    this.live.add(tempDir);

    const mockFiles: string[] = [];
    let mockAudioPath: string | undefined;

    if (sample.requiresAudioFile) {
      mockAudioPath = join(tempDir, MOCK_AUDIO_FILENAME);
      try {
        await writeFile(mockAudioPath, createWavHeader());
      } catch (err) {
        await this.cleanup({ tempDir, mockFiles, envVars: {} });
        throw new SandboxError(
          `Failed to create mock audio file: ${err instanceof Error ? err.message : String(err)}`,
          err,
        );
      }
      mockFiles.push(mockAudioPath);
    }

    const envVars = Object.fromEntries(
      this.options.credentialVariables.map((name) => [name, this.options.apiKeyPlaceholder]),
    );

    logger.debug(`Prepared ${tempDir}`, { mockFiles });
    return {
      tempDir,
      mockFiles,
      envVars,
      ...(mockAudioPath ? { mockAudioPath } : {}),
    };
  }

  /** Remove the sandbox directory. Never throws. */
  async cleanup(environment: ExecutionEnvironment): Promise<void> {
    if (!this.live.delete(environment.tempDir)) {
      logger.debug(`Sandbox ${environment.tempDir} already cleaned up`);
      return;
    }

    try {
      await rm(environment.tempDir, { recursive: true, force: true });
    } catch (err) {
      logger.warn(`Failed to clean up ${environment.tempDir}`, err);
    }
  }

  async withEnvironment<T>(sample: CodeSample, fn: (environment: ExecutionEnvironment) => Promise<T>): Promise<T> {
    const environment = await this.prepare(sample);
    try {
      return await fn(environment);
    } finally {
      await this.cleanup(environment);
    }
  }

  /** Directories prepared and not yet cleaned up */
  liveDirectories(): string[] {
    return [...this.live];
  }
}
