/**
 * taskrelay public API.
 * Embed the orchestrator or the HTTP app without going through the CLI.
 */

export {
  Orchestrator,
  compose,
  createTaskRequest,
  parseRunBody,
  runFallbackChain,
  planEngineSteps,
} from './core/index.js';
export type { OrchestratorDeps, StrategyDescriptor, TaskRequestInput } from './core/index.js';
export { loadConfigFile, loadOptionalConfigFile, loadServiceConfig } from './config/index.js';
export type { Env } from './config/index.js';
export { createEngine, createMockEngine, createStagehandEngine } from './engine/index.js';
export type { BrowserEngine, EnginePage, EngineSession, MockScript } from './engine/index.js';
export { runExternalTool, buildExternalToolCommand } from './external/index.js';
export type { ProcessRunner } from './external/index.js';
export { buildServer, startServer } from './server/index.js';
export { describeConfig, toWireError, toWireSuccess } from './report/index.js';
export type {
  ExecutionAttemptResult,
  OrchestrationResult,
  ServiceConfig,
  TaskRequest,
} from './schema/index.js';
export {
  ConfigurationError,
  InvalidRequestError,
  TimeoutError,
  NonZeroExitError,
  MarkerNotFoundError,
  EngineError,
  SessionError,
} from './utils/errors.js';
