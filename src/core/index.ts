/**
 * Core module: the task execution orchestrator.
 * Composes prompts, plans strategy precedence, runs the fallback chain.
 */

export { Orchestrator, composeFailureMessage } from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export {
  compose,
  composeTaskPrompt,
  composeAgentInstruction,
  composeExternalToolInstruction,
  extractClickTarget,
  extractStartUrl,
  deriveStartUrl,
  isActionLike,
  actionPrompts,
} from './composer.js';
export type { ComposedInstruction } from './composer.js';
export { withRetries } from './retry.js';
export type { AttemptFn } from './retry.js';
export {
  runFallbackChain,
  planEngineSteps,
  isDeterministicFirst,
} from './chain.js';
export type {
  StrategyDescriptor,
  ChainOutcome,
  ChainWinner,
  EngineStep,
  EnginePlanEntry,
  EnginePlanInput,
} from './chain.js';
export { clampMaxSteps, createTaskRequest, parseRunBody } from './request.js';
export type { TaskRequestInput } from './request.js';
