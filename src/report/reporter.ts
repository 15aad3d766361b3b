import type {
  ExecutionAttemptResult,
  OrchestrationResult,
  OrchestrationSuccess,
  WireAttempt,
  WireError,
  WireSuccess,
} from '../schema/index.js';

// Re-export contract types for consumers
export type { WireAttempt, WireError, WireSuccess };

// ── Wire generators ─────────────────────────────────────────

export function toWireSuccess(run: OrchestrationSuccess): WireSuccess {
  const r = run.result;
  return {
    ok: true,
    model: run.model,
    engine_used: run.engineUsed,
    task_prompt: run.taskPrompt,
    result: {
      final_result: r.finalMessage,
      confirmed_url: r.confirmedUrl,
      page_title: r.pageTitle,
      is_done: r.isDone,
      action_error: r.actionError,
      agent_error: r.agentError,
      external_tool_error: r.externalToolError,
      fallback_used: r.fallbackUsed,
      external_tool_fallback_used: r.externalToolFallbackUsed,
      attempts: r.attempts.map(attemptToWire),
    },
  };
}

export function toWireError(message: string): WireError {
  return { ok: false, error: message };
}

function attemptToWire(attempt: ExecutionAttemptResult): WireAttempt {
  return {
    strategy: attempt.strategyName,
    succeeded: attempt.succeeded,
    output_summary: attempt.outputSummary,
    confirmed_url: attempt.confirmedUrl ?? null,
    page_title: attempt.pageTitle ?? null,
    raw_error: attempt.rawError ?? null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Terminal summary ────────────────────────────────────────

export function formatSummary(run: OrchestrationResult, durationMs: number): string {
  const lines: string[] = ['', '--- taskrelay result ---'];

  if (run.ok) {
    lines.push(`Result:   OK via ${run.engineUsed}`);
    lines.push(`Model:    ${run.model}`);
    if (run.result.confirmedUrl) lines.push(`URL:      ${run.result.confirmedUrl}`);
    if (run.result.pageTitle) lines.push(`Title:    ${run.result.pageTitle}`);
    lines.push(`Message:  ${firstLine(run.result.finalMessage)}`);
  } else {
    lines.push('Result:   FAILED');
    lines.push(`Error:    ${run.error}`);
  }

  const attempts = run.ok ? run.result.attempts : run.attempts;
  lines.push(`Attempts: ${String(attempts.length)}`);
  for (const attempt of attempts) {
    lines.push(`  ${attempt.succeeded ? '✔' : '✘'} ${describeAttempt(attempt)}`);
  }
  lines.push(`Time:     ${(durationMs / 1000).toFixed(1)}s`, '');

  return lines.join('\n');
}

function describeAttempt(attempt: ExecutionAttemptResult): string {
  return attempt.succeeded
    ? attempt.strategyName
    : `${attempt.strategyName}: ${firstLine(attempt.rawError ?? 'failed')}`;
}

function firstLine(text: string): string {
  return text.split('\n')[0] ?? '';
}
