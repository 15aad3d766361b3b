import type { TimeoutBudgets } from '../config/budgets.js';
import type { EnginePage, EngineSession } from '../engine/index.js';
import { runExternalTool } from '../external/index.js';
import type { ExternalToolSettings, ProcessRunner } from '../external/index.js';
import type { ExecutionAttemptResult, StrategyName, TaskRequest } from '../schema/index.js';
import { succeededAttempt } from '../schema/index.js';
import { EngineError, errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import type { StrategyDescriptor, EnginePlanEntry, EngineStep } from './chain.js';
import type { ComposedInstruction } from './composer.js';
import { actionPrompts, composeExternalToolInstruction } from './composer.js';
import { withRetries } from './retry.js';

// ── Engine strategies ────────────────────────────────────────

export interface EngineStrategyContext {
  request: TaskRequest;
  composed: ComposedInstruction;
  session: EngineSession;
  page: EnginePage;
  budgets: TimeoutBudgets;
  signal?: AbortSignal | undefined;
}

/** Page state read after a success; a failing URL or title read is not a failure. */
async function readPageState(
  ctx: EngineStrategyContext,
): Promise<{ confirmedUrl: string; pageTitle: string }> {
  let confirmedUrl = '';
  try {
    confirmedUrl = ctx.page.url();
  } catch (err) {
    log.warn(`Could not read page URL: ${errorMessage(err)}`);
  }
  let pageTitle = '';
  try {
    pageTitle = await ctx.budgets.run(
      'action',
      'Reading page title',
      () => ctx.page.title(),
      ctx.signal,
    );
  } catch (err) {
    log.warn(`Could not read page title: ${errorMessage(err)}`);
  }
  return { confirmedUrl, pageTitle };
}

async function actOnce(
  ctx: EngineStrategyContext,
  prompt: string,
  label: string,
): Promise<string> {
  const timeoutMs = ctx.budgets.get('action');
  const outcome = await ctx.budgets.run(
    'action',
    label,
    () => ctx.page.act(prompt, { timeoutMs }),
    ctx.signal,
  );
  if (!outcome.success) {
    throw new EngineError(outcome.message || `${label} reported failure`);
  }
  return outcome.message;
}

/** Two phrasings of one action; the second only runs if the first fails. */
async function actWithRephrase(
  ctx: EngineStrategyContext,
  first: { prompt: string; label: string },
  second: { prompt: string; label: string },
): Promise<ExecutionAttemptResult> {
  const message = await withRetries(
    (attemptIndex) => {
      const phrasing = attemptIndex === 0 ? first : second;
      return actOnce(ctx, phrasing.prompt, phrasing.label);
    },
    2,
    0,
    ctx.signal,
  );
  return succeededAttempt(
    'engine-deterministic-action',
    message || 'Completed browser task via act.',
    await readPageState(ctx),
  );
}

export function runDeterministicAction(
  ctx: EngineStrategyContext,
): Promise<ExecutionAttemptResult> {
  const { clickTarget, taskPrompt } = ctx.composed;
  return actWithRephrase(
    ctx,
    {
      prompt: clickTarget ? actionPrompts.click(clickTarget) : taskPrompt,
      label: 'Engine act deterministic step',
    },
    { prompt: taskPrompt, label: 'Engine act deterministic retry' },
  );
}

export function runClickFallback(ctx: EngineStrategyContext): Promise<ExecutionAttemptResult> {
  const { clickTarget } = ctx.composed;
  return actWithRephrase(
    ctx,
    { prompt: actionPrompts.directClick(clickTarget), label: 'Engine act fallback' },
    {
      prompt: actionPrompts.primaryCallToAction(clickTarget),
      label: 'Engine act fallback retry',
    },
  );
}

export async function runTaskAction(ctx: EngineStrategyContext): Promise<ExecutionAttemptResult> {
  const message = await actOnce(ctx, ctx.composed.taskPrompt, 'Engine act task');
  return succeededAttempt(
    'engine-deterministic-action',
    message || 'Completed browser task via act.',
    await readPageState(ctx),
  );
}

export async function runAutonomousAgent(
  ctx: EngineStrategyContext,
): Promise<ExecutionAttemptResult> {
  const outcome = await ctx.budgets.run(
    'agent',
    'Engine agent',
    () =>
      ctx.session.runAgent(ctx.page, {
        instruction: ctx.composed.agentInstruction,
        maxSteps: ctx.request.maxSteps,
      }),
    ctx.signal,
  );
  if (!outcome.success && !outcome.completed) {
    throw new EngineError(
      outcome.message
        ? `Agent did not complete the task: ${outcome.message}`
        : 'Agent did not complete the task',
    );
  }
  return succeededAttempt(
    'engine-autonomous-agent',
    outcome.message || 'Completed browser task with engine agent.',
    await readPageState(ctx),
  );
}

const ENGINE_STEPS: Readonly<
  Record<
    EngineStep,
    {
      name: StrategyName;
      run: (ctx: EngineStrategyContext) => Promise<ExecutionAttemptResult>;
    }
  >
> = {
  'deterministic-action': { name: 'engine-deterministic-action', run: runDeterministicAction },
  'autonomous-agent': { name: 'engine-autonomous-agent', run: runAutonomousAgent },
  'click-fallback': { name: 'engine-deterministic-action', run: runClickFallback },
  'task-action': { name: 'engine-deterministic-action', run: runTaskAction },
};

export function engineDescriptors(
  plan: readonly EnginePlanEntry[],
  ctx: EngineStrategyContext,
): StrategyDescriptor[] {
  return plan.map((entry) => {
    const step = ENGINE_STEPS[entry.step];
    return {
      name: step.name,
      label: entry.step,
      enabled: entry.enabled,
      run: () => step.run(ctx),
    };
  });
}

// ── External tool strategies ─────────────────────────────────

export interface ExternalToolContext {
  request: TaskRequest;
  settings: ExternalToolSettings;
  budgets: TimeoutBudgets;
  runner?: ProcessRunner | undefined;
  signal?: AbortSignal | undefined;
}

export async function runExternalToolStrategy(
  name: 'external-tool-primary' | 'external-tool-fallback',
  ctx: ExternalToolContext,
): Promise<ExecutionAttemptResult> {
  const output = await runExternalTool(
    ctx.settings,
    ctx.budgets.get('externalTool'),
    {
      instruction: composeExternalToolInstruction(ctx.request.instruction, ctx.request.startUrl),
      startUrl: ctx.request.startUrl,
      maxSteps: ctx.request.maxSteps,
    },
    { runner: ctx.runner, signal: ctx.signal },
  );
  return succeededAttempt(name, output || 'Completed browser task via external tool.', {
    confirmedUrl: ctx.request.startUrl,
    pageTitle: '',
  });
}

export function externalToolDescriptor(
  name: 'external-tool-primary' | 'external-tool-fallback',
  enabled: boolean,
  ctx: ExternalToolContext,
): StrategyDescriptor {
  return {
    name,
    label: name,
    enabled,
    run: () => runExternalToolStrategy(name, ctx),
  };
}
