import { spawn } from 'node:child_process';

import { NonZeroExitError, TimeoutError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  hardTimeoutMs: number;
  /** Shell used as `<shell> -c <command>`. */
  shell: string;
  signal?: AbortSignal | undefined;
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Run a shell command to completion under a hard wall-clock limit.
 *
 * The child leads its own process group so a timeout kills everything it
 * started, not only the shell. The promise settles as soon as the timer
 * fires; it does not wait for grandchildren to release the pipes.
 */
export function runProcess(
  command: string,
  options: RunProcessOptions,
): Promise<ProcessOutput> {
  return new Promise<ProcessOutput>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(abortReason(options.signal));
      return;
    }

    const child = spawn(options.shell, ['-c', command], {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      fn();
    };

    const kill = (): void => {
      try {
        if (child.pid !== undefined) {
          process.kill(-child.pid, 'SIGKILL');
        } else {
          child.kill('SIGKILL');
        }
      } catch {
        // Group already gone; the close handler settles.
      }
    };

    const timer = setTimeout(() => {
      kill();
      settle(() => {
        reject(
          new TimeoutError(
            `Command timed out after ${String(options.hardTimeoutMs)}ms`,
            options.hardTimeoutMs,
          ),
        );
      });
    }, options.hardTimeoutMs);

    const onAbort = (): void => {
      kill();
      settle(() => {
        reject(options.signal ? abortReason(options.signal) : new Error('Command aborted'));
      });
    };

    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (err) => {
      settle(() => {
        reject(err);
      });
    });

    child.on('close', (code, exitSignal) => {
      settle(() => {
        if (code !== 0) {
          const fallback =
            code === null
              ? `Command terminated by ${exitSignal ?? 'an unknown signal'}`
              : `Command failed with exit code ${String(code)}`;
          reject(new NonZeroExitError(stderr.trim() || stdout.trim() || fallback, code));
          return;
        }
        resolve({ stdout, stderr });
      });
    });
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Command aborted');
}

// ── Output classification ────────────────────────────────────

const SUCCESS_MARKERS = [/success:\s*true/i, /done:\s*true/i] as const;

/** Logical success for tools that report it in text rather than exit codes. */
export function hasSuccessMarker(output: string): boolean {
  return SUCCESS_MARKERS.some((marker) => marker.test(output));
}

export function combineOutput(output: ProcessOutput): string {
  return `${output.stdout}\n${output.stderr}`.trim();
}
