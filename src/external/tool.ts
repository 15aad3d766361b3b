import type { ServiceConfig } from '../schema/index.js';
import { LIMITS, OUTPUT_GUARDS } from '../config/defaults.js';
import { combineOutput, hasSuccessMarker, runProcess } from '../process/runner.js';
import type { ProcessOutput, RunProcessOptions } from '../process/runner.js';
import { MarkerNotFoundError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export type ExternalToolSettings = ServiceConfig['externalTool'];

export interface ExternalToolRun {
  /** Instruction already phrased for the tool (see `composeExternalToolInstruction`). */
  instruction: string;
  startUrl: string;
  maxSteps: number;
}

export type ProcessRunner = (
  command: string,
  options: RunProcessOptions,
) => Promise<ProcessOutput>;

export interface ExternalToolDeps {
  runner?: ProcessRunner | undefined;
  sessionName?: string | undefined;
  signal?: AbortSignal | undefined;
}

// ── Command building ─────────────────────────────────────────

/** POSIX single-quote escaping. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function clampToolSteps(maxSteps: number): number {
  return Math.max(
    LIMITS.EXTERNAL_TOOL_MIN_STEPS,
    Math.min(LIMITS.EXTERNAL_TOOL_MAX_STEPS, maxSteps),
  );
}

export function createSessionName(prefix: string, now: number = Date.now()): string {
  return `${prefix}-${String(now)}`;
}

/**
 * One shell pipeline: open the start URL, run the instruction, close the
 * session. `close` never fails the pipeline.
 */
export function buildExternalToolCommand(
  settings: ExternalToolSettings,
  run: ExternalToolRun,
  sessionName: string,
): string {
  const session = `${settings.command} --session ${shellQuote(sessionName)}`;
  const browser = `${session} --browser ${shellQuote(settings.browser)}${
    settings.headed ? ' --headed' : ''
  }`;

  const commands: string[] = [];
  if (run.startUrl) {
    commands.push(`${browser} open ${shellQuote(run.startUrl)}`);
  }
  commands.push(
    `${browser} run ${shellQuote(run.instruction)} --max-steps ${String(clampToolSteps(run.maxSteps))}`,
  );
  commands.push(`${session} close || true`);

  return commands.join('; ');
}

// ── Execution ────────────────────────────────────────────────

/**
 * Run the external tool and classify its output.
 * Resolves with the (truncated) combined output when a success marker is
 * present; rejects with the process error or `MarkerNotFoundError`.
 */
export async function runExternalTool(
  settings: ExternalToolSettings,
  timeoutMs: number,
  run: ExternalToolRun,
  deps: ExternalToolDeps = {},
): Promise<string> {
  const runner = deps.runner ?? runProcess;
  const sessionName = deps.sessionName ?? createSessionName(settings.sessionPrefix);
  const command = buildExternalToolCommand(settings, run, sessionName);

  const output = await runner(command, {
    hardTimeoutMs: timeoutMs + settings.graceMs,
    shell: settings.shell,
    signal: deps.signal,
  });

  const combined = combineOutput(output);
  if (!hasSuccessMarker(combined)) {
    throw new MarkerNotFoundError(
      'External tool',
      combined.slice(0, OUTPUT_GUARDS.MARKER_EXCERPT_CHARS),
    );
  }
  return combined.slice(0, OUTPUT_GUARDS.OUTPUT_SUMMARY_CHARS);
}
