/**
 * Subprocess runner.
 *
 * Spawns one child per call with:
 * - Caller-supplied environment (mocked credentials already merged in)
 * - Timeout enforcement (SIGTERM → grace → SIGKILL) on the child's whole
 *   process group, so programs started by `go run` or `dotnet run` stop too
 * - Full stdout/stderr capture as UTF-8 text
 *
 * A child that never starts rejects with ProcessLaunchError. A child that
 * outlives its timeout resolves with `timedOut: true`; timeouts never throw.
 */

import { spawn } from 'node:child_process';
import { ProcessLaunchError } from '@doctester/shared/Types/errors.js';
import { Logger } from '@doctester/shared/Utils/logger.js';
import type { ProcessOutcome, ProcessRequest } from './types.js';

const logger = new Logger('doctester:subprocess');

const DEFAULT_KILL_GRACE_MS = 5_000;

export function runProcess(request: ProcessRequest): Promise<ProcessOutcome> {
  const startTime = Date.now();
  const graceMs = request.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise<ProcessOutcome>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let exited = false;
    let exitCode: number | null = null;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let settled = false;

    logger.debug(`Spawning ${request.command}`, { args: request.args, cwd: request.cwd });

    // Own process group: a timeout signals every descendant, not just the wrapper
    const child = spawn(request.command, [...request.args], {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    // Spawn errors (command not found, bad cwd)
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      reject(new ProcessLaunchError(`Failed to start ${request.command}: ${err.message}`, err));
    });

    child.on('exit', (code) => {
      exited = true;
      exitCode = code;
      // A descendant that survived the group signal may still hold the pipes open
      if (timedOut) finish(code);
    });

    child.on('close', (code) => finish(code));

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      logger.debug(`${request.command} exceeded ${request.timeoutMs}ms, sending SIGTERM`);
      signalGroup('SIGTERM');

      // Runs after settlement too, so a descendant ignoring SIGTERM still dies
      killTimer = setTimeout(() => signalGroup('SIGKILL'), graceMs);

      if (exited) finish(exitCode);
    }, request.timeoutMs);

    function finish(code: number | null): void {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (timedOut) {
        child.stdout.destroy();
        child.stderr.destroy();
      }

      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        exitCode: code,
        durationMs: Date.now() - startTime,
        timedOut,
      });
    }

    function signalGroup(signal: NodeJS.Signals): void {
      const pid = child.pid;
      if (pid === undefined) return;
      if (process.platform === 'win32') {
        child.kill(signal);
        return;
      }
      try {
        process.kill(-pid, signal);
      } catch (err) {
        // ESRCH once every member of the group has exited
        logger.debug(`Process group ${pid} not signalled with ${signal}`, err);
      }
    }
  });
}
