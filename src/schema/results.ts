import { z } from 'zod';

// ── Strategy names ──────────────────────────────────────────

export const strategyNameSchema = z.enum([
  'external-tool-primary',
  'engine-deterministic-action',
  'engine-autonomous-agent',
  'external-tool-fallback',
]);

export type StrategyName = z.infer<typeof strategyNameSchema>;

// Session bring-up is not a strategy, but its failure is recorded alongside them.
export const attemptNameSchema = z.union([strategyNameSchema, z.literal('engine-session')]);

export type AttemptName = z.infer<typeof attemptNameSchema>;

// ── ExecutionAttemptResult ──────────────────────────────────

export const executionAttemptResultSchema = z.object({
  strategyName: attemptNameSchema,
  succeeded: z.boolean(),
  outputSummary: z.string(),
  confirmedUrl: z.string().optional(),
  pageTitle: z.string().optional(),
  rawError: z.string().optional(),
});

export type ExecutionAttemptResult = Readonly<z.infer<typeof executionAttemptResultSchema>>;

export function succeededAttempt(
  strategyName: AttemptName,
  outputSummary: string,
  page?: { confirmedUrl?: string | undefined; pageTitle?: string | undefined },
): ExecutionAttemptResult {
  return Object.freeze({
    strategyName,
    succeeded: true,
    outputSummary,
    ...(page?.confirmedUrl !== undefined ? { confirmedUrl: page.confirmedUrl } : {}),
    ...(page?.pageTitle !== undefined ? { pageTitle: page.pageTitle } : {}),
  });
}

export function failedAttempt(
  strategyName: AttemptName,
  rawError: string,
): ExecutionAttemptResult {
  return Object.freeze({
    strategyName,
    succeeded: false,
    outputSummary: '',
    rawError,
  });
}

// ── OrchestrationResult ─────────────────────────────────────

export interface OrchestrationDetails {
  readonly finalMessage: string;
  readonly confirmedUrl: string;
  readonly pageTitle: string;
  readonly isDone: boolean;
  readonly actionError: string | null;
  readonly agentError: string | null;
  readonly externalToolError: string | null;
  /** At least one engine `act` attempt ran during the request. */
  readonly fallbackUsed: boolean;
  readonly externalToolFallbackUsed: boolean;
  readonly attempts: readonly ExecutionAttemptResult[];
}

export interface OrchestrationSuccess {
  readonly ok: true;
  readonly engineUsed: StrategyName;
  /** Model name for engine runs, strategy name for external-tool runs. */
  readonly model: string;
  readonly taskPrompt: string;
  readonly result: OrchestrationDetails;
}

export interface OrchestrationFailure {
  readonly ok: false;
  readonly error: string;
  readonly taskPrompt: string;
  readonly attempts: readonly ExecutionAttemptResult[];
}

export type OrchestrationResult = OrchestrationSuccess | OrchestrationFailure;
