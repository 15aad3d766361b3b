import { TimeoutBudgets } from '../config/budgets.js';
import { TIMEOUTS } from '../config/defaults.js';
import { assertEngineCredentials } from '../engine/index.js';
import type { BrowserEngine, EnginePage, EngineSession } from '../engine/index.js';
import type { ProcessRunner } from '../external/index.js';
import { MISSING_INSTRUCTION, failedAttempt } from '../schema/index.js';
import type {
  ExecutionAttemptResult,
  OrchestrationDetails,
  OrchestrationResult,
  ServiceConfig,
  StrategyName,
  TaskRequest,
} from '../schema/index.js';
import { createDeadline } from '../utils/deadline.js';
import { InvalidRequestError, SessionError, errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { planEngineSteps, runFallbackChain } from './chain.js';
import type { ChainWinner } from './chain.js';
import { compose } from './composer.js';
import type { ComposedInstruction } from './composer.js';
import { withRetries } from './retry.js';
import { engineDescriptors, externalToolDescriptor } from './strategies.js';
import type { ExternalToolContext } from './strategies.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorDeps {
  engine: BrowserEngine;
  /** Subprocess runner for the external tool; defaults to the real one. */
  runner?: ProcessRunner | undefined;
}

// Thrown inside a session run so the retry wrapper sees a failure; the
// individual reasons are already in the attempt list.
class EngineExhaustedError extends Error {
  constructor() {
    super('No engine strategy succeeded');
    this.name = 'EngineExhaustedError';
  }
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Runs one browser instruction through the fallback chain.
 * Holds only immutable config and the engine factory, so one instance
 * serves any number of concurrent requests.
 */
export class Orchestrator {
  private readonly config: Readonly<ServiceConfig>;
  private readonly engine: BrowserEngine;
  private readonly runner: ProcessRunner | undefined;
  private readonly budgets: TimeoutBudgets;

  constructor(config: Readonly<ServiceConfig>, deps: OrchestratorDeps) {
    this.config = config;
    this.engine = deps.engine;
    this.runner = deps.runner;
    this.budgets = new TimeoutBudgets(config.timeouts);
  }

  async execute(request: TaskRequest, signal?: AbortSignal): Promise<OrchestrationResult> {
    if (!request.instruction.trim()) {
      throw new InvalidRequestError(MISSING_INSTRUCTION);
    }

    const composed = compose(request.instruction, request.context, request.startUrl);
    const attempts: ExecutionAttemptResult[] = [];
    const external: ExternalToolContext = {
      request,
      settings: this.config.externalTool,
      budgets: this.budgets,
      runner: this.runner,
      signal,
    };

    log.section(`Task: ${request.instruction}`);
    log.detail(`start URL: ${request.startUrl || '(none)'}`);
    log.detail(`click target: ${composed.clickTarget || '(none)'}`);

    // ── 1. External tool as primary: single strategy, no engine ──

    if (this.config.primaryEngine === 'external-tool') {
      const chain = await runFallbackChain(
        [externalToolDescriptor('external-tool-primary', true, external)],
        attempts,
      );
      return this.finish(chain.winner, composed, request, attempts);
    }

    // ── 2. Engine session(s), then the external-tool fallback ──

    assertEngineCredentials(this.config);

    const winner =
      (await this.runEngine(request, composed, attempts, signal)) ??
      (
        await runFallbackChain(
          [
            externalToolDescriptor(
              'external-tool-fallback',
              this.config.externalTool.fallbackEnabled,
              external,
            ),
          ],
          attempts,
        )
      ).winner;

    return this.finish(winner, composed, request, attempts);
  }

  // ── Engine portion ─────────────────────────────────────────

  private async runEngine(
    request: TaskRequest,
    composed: ComposedInstruction,
    attempts: ExecutionAttemptResult[],
    signal: AbortSignal | undefined,
  ): Promise<ChainWinner | null> {
    // Step budgets stay independent of `overall`; it only gates starting
    // another session or another strategy.
    const overall = createDeadline(this.budgets.get('overall'), 'Engine run', signal);
    try {
      return await withRetries(
        () => this.runEngineSession(request, composed, attempts, signal, overall.signal),
        this.config.retries.count + 1,
        this.config.retries.backoffMs,
        overall.signal,
      );
    } catch (err) {
      if (!(err instanceof EngineExhaustedError) && !(err instanceof SessionError)) {
        attempts.push(failedAttempt('engine-session', errorMessage(err)));
      }
      return null;
    } finally {
      overall.dispose();
    }
  }

  private async runEngineSession(
    request: TaskRequest,
    composed: ComposedInstruction,
    attempts: ExecutionAttemptResult[],
    signal: AbortSignal | undefined,
    overall: AbortSignal,
  ): Promise<ChainWinner> {
    const session = this.engine.createSession();
    try {
      const page = await this.openPage(session, request, signal).catch((err: unknown) => {
        const failure = err instanceof SessionError ? err : new SessionError('init', err);
        attempts.push(failedAttempt('engine-session', failure.message));
        log.attemptResult('engine-session', false, failure.message);
        throw failure;
      });

      const plan = planEngineSteps({
        instruction: request.instruction,
        clickTarget: composed.clickTarget,
        executionStrategy: this.config.executionStrategy,
        agentEnabled: this.config.agent.enabled,
      });
      const chain = await runFallbackChain(
        engineDescriptors(plan, {
          request,
          composed,
          session,
          page,
          budgets: this.budgets,
          signal,
        }),
        attempts,
        overall,
      );

      if (!chain.winner) throw new EngineExhaustedError();
      return chain.winner;
    } finally {
      if (!request.keepAlive) {
        await this.closeQuietly(session);
      }
    }
  }

  private async openPage(
    session: EngineSession,
    request: TaskRequest,
    signal: AbortSignal | undefined,
  ): Promise<EnginePage> {
    await this.budgets
      .run('init', 'Engine init', (initSignal) => session.init(initSignal), signal)
      .catch((err: unknown) => {
        throw new SessionError('init', err);
      });

    const page = await this.budgets
      .run('init', 'Resolving active page', () => session.resolvePage(request.startUrl), signal)
      .catch((err: unknown) => {
        throw new SessionError('page', err);
      });

    if (request.startUrl) {
      const timeoutMs = this.budgets.get('navigation');
      await this.budgets
        .run('navigation', 'Navigation', () => page.goto(request.startUrl, { timeoutMs }), signal)
        .catch((err: unknown) => {
          throw new SessionError('navigation', err);
        });
    }

    return page;
  }

  // Teardown never masks the primary result or error.
  private async closeQuietly(session: EngineSession): Promise<void> {
    try {
      await this.budgets.runFor(
        TIMEOUTS.CLOSE_TIMEOUT,
        'Closing engine session',
        () => session.close(),
      );
    } catch (err) {
      log.warn(`Engine session close failed: ${errorMessage(err)}`);
    }
  }

  // ── Result assembly ────────────────────────────────────────

  private finish(
    winner: ChainWinner | null,
    composed: ComposedInstruction,
    request: TaskRequest,
    attempts: readonly ExecutionAttemptResult[],
  ): OrchestrationResult {
    const frozenAttempts = Object.freeze([...attempts]);

    if (!winner) {
      const error = composeFailureMessage(frozenAttempts);
      log.error(error);
      return { ok: false, error, taskPrompt: composed.taskPrompt, attempts: frozenAttempts };
    }

    const result: OrchestrationDetails = {
      finalMessage: winner.attempt.outputSummary,
      confirmedUrl: winner.attempt.confirmedUrl || request.startUrl,
      pageTitle: winner.attempt.pageTitle ?? '',
      isDone: true,
      actionError: lastError(frozenAttempts, 'engine-deterministic-action'),
      agentError: lastError(frozenAttempts, 'engine-autonomous-agent'),
      externalToolError:
        lastError(frozenAttempts, 'external-tool-fallback') ??
        lastError(frozenAttempts, 'external-tool-primary'),
      fallbackUsed: frozenAttempts.some(
        (a) => a.strategyName === 'engine-deterministic-action',
      ),
      externalToolFallbackUsed: isExternalTool(winner.strategy),
      attempts: frozenAttempts,
    };

    log.info(`Completed via ${winner.strategy}`);
    return {
      ok: true,
      engineUsed: winner.strategy,
      model: this.modelFor(winner.strategy),
      taskPrompt: composed.taskPrompt,
      result,
    };
  }

  private modelFor(strategy: StrategyName): string {
    switch (strategy) {
      case 'engine-autonomous-agent':
        return this.config.engine.agentModel;
      case 'engine-deterministic-action':
        return this.config.engine.model;
      case 'external-tool-primary':
      case 'external-tool-fallback':
        return strategy;
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

function isExternalTool(strategy: StrategyName): boolean {
  return strategy === 'external-tool-primary' || strategy === 'external-tool-fallback';
}

function lastError(
  attempts: readonly ExecutionAttemptResult[],
  strategy: StrategyName,
): string | null {
  for (let i = attempts.length - 1; i >= 0; i--) {
    const attempt = attempts[i];
    if (attempt?.strategyName === strategy && attempt.rawError !== undefined) {
      return attempt.rawError;
    }
  }
  return null;
}

/** One line per distinct `<strategy>: <reason>`, in the order they happened. */
export function composeFailureMessage(attempts: readonly ExecutionAttemptResult[]): string {
  const reasons = [
    ...new Set(
      attempts
        .filter((a) => !a.succeeded)
        .map((a) => `${a.strategyName}: ${a.rawError ?? 'failed'}`),
    ),
  ];
  if (reasons.length === 0) {
    return 'Failed to execute task: no execution path succeeded.';
  }
  return `Failed to execute task: ${reasons.join('; ')}`;
}
