import type { ServiceConfig } from '../schema/index.js';

export const SERVICE_NAME = 'taskrelay-browser';

export interface HealthReport {
  ok: true;
  service: string;
  primary_engine: ServiceConfig['primaryEngine'];
  engine_provider: ServiceConfig['engineProvider'];
  engine_env: ServiceConfig['engine']['env'];
  strategy: ServiceConfig['executionStrategy'];
  model: string;
  agent_model: string;
  agent_enabled: boolean;
  agent_mode: ServiceConfig['agent']['mode'];
  external_tool_fallback: boolean;
  external_tool_command: string;
  retries: number;
  retry_backoff_ms: number;
  timeout_ms: number;
  init_timeout_ms: number;
  nav_timeout_ms: number;
  act_timeout_ms: number;
  agent_timeout_ms: number;
  external_tool_timeout_ms: number;
  disable_api: boolean;
  self_heal: boolean;
  dom_settle_timeout_ms: number;
  system_prompt_loaded: boolean;
  system_prompt_path: string;
  model_key_configured: boolean;
  browserbase_key_configured: boolean;
  browserbase_project_configured: boolean;
}

/** Read-only view of the effective configuration; never exposes secrets. */
export function describeConfig(config: Readonly<ServiceConfig>): HealthReport {
  return {
    ok: true,
    service: SERVICE_NAME,
    primary_engine: config.primaryEngine,
    engine_provider: config.engineProvider,
    engine_env: config.engine.env,
    strategy: config.executionStrategy,
    model: config.engine.model,
    agent_model: config.engine.agentModel,
    agent_enabled: config.agent.enabled,
    agent_mode: config.agent.mode,
    external_tool_fallback: config.externalTool.fallbackEnabled,
    external_tool_command: config.externalTool.command,
    retries: config.retries.count,
    retry_backoff_ms: config.retries.backoffMs,
    timeout_ms: config.timeouts.overall,
    init_timeout_ms: config.timeouts.init,
    nav_timeout_ms: config.timeouts.navigation,
    act_timeout_ms: config.timeouts.action,
    agent_timeout_ms: config.timeouts.agent,
    external_tool_timeout_ms: config.timeouts.externalTool,
    disable_api: config.engine.disableApi,
    self_heal: config.engine.selfHeal,
    dom_settle_timeout_ms: config.engine.domSettleTimeoutMs,
    system_prompt_loaded: config.engine.systemPrompt !== '',
    system_prompt_path: config.engine.systemPromptPath,
    model_key_configured: config.credentials.modelApiKey !== undefined,
    browserbase_key_configured: config.credentials.browserbaseApiKey !== undefined,
    browserbase_project_configured: config.credentials.browserbaseProjectId !== undefined,
  };
}
