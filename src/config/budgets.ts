import type { BudgetName, Timeouts } from '../schema/index.js';
import { createDeadline, raceSignal } from '../utils/deadline.js';
import { TIMEOUT_FLOORS, TIMEOUTS } from './defaults.js';

// ── Effective values ────────────────────────────────────────

/** `max(floor, configured)`; a missing or non-finite value takes the fallback. */
export function effectiveBudget(
  floor: number,
  configured: number | undefined,
  fallback: number,
): number {
  const value =
    configured !== undefined && Number.isFinite(configured) ? configured : fallback;
  return Math.max(floor, Math.round(value));
}

/**
 * Resolve every named budget. `action`, `agent` and `externalTool` default
 * relative to the effective `overall` value.
 */
export function resolveTimeouts(
  configured: Partial<Record<BudgetName, number | undefined>>,
): Timeouts {
  const overall = effectiveBudget(
    TIMEOUT_FLOORS.overall,
    configured.overall,
    TIMEOUTS.OVERALL_TIMEOUT,
  );

  return {
    overall,
    init: effectiveBudget(TIMEOUT_FLOORS.init, configured.init, TIMEOUTS.INIT_TIMEOUT),
    navigation: effectiveBudget(
      TIMEOUT_FLOORS.navigation,
      configured.navigation,
      TIMEOUTS.NAVIGATION_TIMEOUT,
    ),
    action: effectiveBudget(
      TIMEOUT_FLOORS.action,
      configured.action,
      Math.min(TIMEOUTS.ACTION_TIMEOUT, overall),
    ),
    agent: effectiveBudget(
      TIMEOUT_FLOORS.agent,
      configured.agent,
      Math.min(TIMEOUTS.AGENT_TIMEOUT, overall),
    ),
    externalTool: effectiveBudget(
      TIMEOUT_FLOORS.externalTool,
      configured.externalTool,
      overall,
    ),
  };
}

// ── Budget manager ──────────────────────────────────────────

export type BoundedWork<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Bounds every suspension point with one of the named budgets.
 * Each call derives its own deadline signal, chained to an optional parent.
 */
export class TimeoutBudgets {
  private readonly timeouts: Readonly<Timeouts>;

  constructor(timeouts: Readonly<Timeouts>) {
    this.timeouts = timeouts;
  }

  get(name: BudgetName): number {
    return this.timeouts[name];
  }

  run<T>(
    name: BudgetName,
    label: string,
    work: BoundedWork<T>,
    parent?: AbortSignal,
  ): Promise<T> {
    return this.runFor(this.timeouts[name], label, work, parent);
  }

  async runFor<T>(
    ms: number,
    label: string,
    work: BoundedWork<T>,
    parent?: AbortSignal,
  ): Promise<T> {
    const deadline = createDeadline(ms, label, parent);
    try {
      return await raceSignal(startWork(work, deadline.signal), deadline.signal);
    } finally {
      deadline.dispose();
    }
  }
}

// Synchronous throws inside `work` become rejections.
function startWork<T>(work: BoundedWork<T>, signal: AbortSignal): Promise<T> {
  try {
    return work(signal);
  } catch (err) {
    return Promise.reject(err instanceof Error ? err : new Error(String(err)));
  }
}
