/**
 * Scriptable engine module.
 * Provider-agnostic browser session interface for the orchestrator.
 * Only module allowed to touch the engine library.
 */

import type { ServiceConfig } from '../schema/index.js';
import { ConfigurationError } from '../utils/errors.js';
import type { BrowserEngine } from './client.js';
import { createStagehandEngine } from './stagehand.js';
import { createMockEngine } from './mock.js';

export * from './client.js';
export { createStagehandEngine } from './stagehand.js';
export type { StagehandSettings } from './stagehand.js';
export { createMockEngine } from './mock.js';
export type { MockCall, MockEngine, MockScript } from './mock.js';

// ── Credential checks ────────────────────────────────────────

/** Fatal configuration errors for the engine path; never retried. */
export function assertEngineCredentials(config: Readonly<ServiceConfig>): void {
  if (config.engineProvider === 'mock') return;

  if (!config.credentials.modelApiKey) {
    throw new ConfigurationError(
      config.engine.modelProvider === 'anthropic'
        ? 'ANTHROPIC_API_KEY is required'
        : 'OPENAI_API_KEY is required',
    );
  }

  if (config.engine.env === 'BROWSERBASE') {
    if (!config.credentials.browserbaseApiKey) {
      throw new ConfigurationError('BROWSERBASE_API_KEY is required');
    }
    if (!config.credentials.browserbaseProjectId) {
      throw new ConfigurationError('BROWSERBASE_PROJECT_ID is required');
    }
  }
}

// ── Provider factory ─────────────────────────────────────────

export function createEngine(config: Readonly<ServiceConfig>): BrowserEngine {
  switch (config.engineProvider) {
    case 'stagehand':
      return createStagehandEngine({
        engine: config.engine,
        agent: config.agent,
        credentials: config.credentials,
      });
    case 'mock':
      return createMockEngine();
  }
}
