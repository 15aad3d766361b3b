import type { ExecutionAttemptResult, StrategyName } from '../schema/index.js';
import type { ExecutionStrategy } from '../schema/index.js';
import { failedAttempt } from '../schema/index.js';
import { errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { isActionLike } from './composer.js';

// ── Descriptors ──────────────────────────────────────────────

export interface StrategyDescriptor {
  readonly name: StrategyName;
  /** Log label; several descriptors can report under one strategy name. */
  readonly label: string;
  readonly enabled: boolean;
  /** Resolves with a success result; any throw is recorded as the failure. */
  run(): Promise<ExecutionAttemptResult>;
}

export interface ChainWinner {
  readonly strategy: StrategyName;
  readonly attempt: ExecutionAttemptResult;
}

export interface ChainOutcome {
  readonly winner: ChainWinner | null;
  readonly attempts: readonly ExecutionAttemptResult[];
}

// ── Fold ─────────────────────────────────────────────────────

/**
 * Run enabled descriptors in order until one succeeds.
 * Failures never escape: each one is appended to `attempts` (shared across
 * chains of the same request) with its message kept as `rawError`.
 * Once `stop` has aborted no further descriptor starts; the first one
 * skipped is recorded with the abort reason.
 */
export async function runFallbackChain(
  descriptors: readonly StrategyDescriptor[],
  attempts: ExecutionAttemptResult[] = [],
  stop?: AbortSignal,
): Promise<ChainOutcome> {
  for (const descriptor of descriptors) {
    if (!descriptor.enabled) continue;

    if (stop?.aborted) {
      const reason = errorMessage(stop.reason);
      attempts.push(failedAttempt(descriptor.name, reason));
      log.attemptResult(descriptor.label, false, reason);
      break;
    }

    log.attempt(descriptor.name, descriptor.label);
    const attempt = await runSafely(descriptor);
    attempts.push(attempt);
    log.attemptResult(
      descriptor.label,
      attempt.succeeded,
      attempt.succeeded ? attempt.outputSummary : attempt.rawError ?? 'failed',
    );

    if (attempt.succeeded) {
      return { winner: { strategy: descriptor.name, attempt }, attempts };
    }
  }
  return { winner: null, attempts };
}

async function runSafely(descriptor: StrategyDescriptor): Promise<ExecutionAttemptResult> {
  try {
    return await descriptor.run();
  } catch (err) {
    return failedAttempt(descriptor.name, errorMessage(err));
  }
}

// ── Engine plan ──────────────────────────────────────────────

export type EngineStep =
  | 'deterministic-action'
  | 'autonomous-agent'
  | 'click-fallback'
  | 'task-action';

export interface EnginePlanInput {
  instruction: string;
  clickTarget: string;
  executionStrategy: ExecutionStrategy;
  agentEnabled: boolean;
}

export interface EnginePlanEntry {
  readonly step: EngineStep;
  readonly enabled: boolean;
}

/** Deterministic-first when action-like under that strategy, or whenever a click target exists. */
export function isDeterministicFirst(input: EnginePlanInput): boolean {
  return (
    (input.executionStrategy === 'deterministic_first' && isActionLike(input.instruction)) ||
    input.clickTarget !== ''
  );
}

/**
 * Fixed precedence for the engine session. Later entries only run when
 * everything before them failed, so "agent after act" and "act after
 * agent" both fall out of one ordered list.
 */
export function planEngineSteps(input: EnginePlanInput): readonly EnginePlanEntry[] {
  const deterministicFirst = isDeterministicFirst(input);
  return [
    { step: 'deterministic-action', enabled: deterministicFirst },
    { step: 'autonomous-agent', enabled: input.agentEnabled },
    { step: 'click-fallback', enabled: input.clickTarget !== '' },
    { step: 'task-action', enabled: !input.agentEnabled && !deterministicFirst },
  ];
}
