/**
 * Default configuration values.
 * All values are overridable via config file or environment.
 */

export const TIMEOUTS = {
  OVERALL_TIMEOUT: 60_000,
  INIT_TIMEOUT: 20_000,
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 25_000,
  AGENT_TIMEOUT: 35_000,
  EXTERNAL_TOOL_GRACE: 15_000,
  CLOSE_TIMEOUT: 5_000,
  DOM_SETTLE_TIMEOUT: 1_800,
} as const;

// Minimum enforced value per budget.
export const TIMEOUT_FLOORS = {
  overall: 15_000,
  init: 5_000,
  navigation: 8_000,
  action: 8_000,
  agent: 8_000,
  externalTool: 15_000,
} as const;

export const LIMITS = {
  DEFAULT_MAX_STEPS: 8,
  MIN_MAX_STEPS: 1,
  MAX_MAX_STEPS: 200,
  EXTERNAL_TOOL_MIN_STEPS: 4,
  EXTERNAL_TOOL_MAX_STEPS: 80,
  RETRIES: 1,
  RETRY_BACKOFF: 1_200,
  MIN_DOM_SETTLE_TIMEOUT: 500,
} as const;

export const OUTPUT_GUARDS = {
  MARKER_EXCERPT_CHARS: 1_200,
  OUTPUT_SUMMARY_CHARS: 2_000,
} as const;

export const SERVER = {
  HOST: '0.0.0.0',
  PORT: 8010,
  BODY_LIMIT: 2 * 1024 * 1024,
} as const;

export const EXTERNAL_TOOL = {
  COMMAND: 'uvx "browser-use[cli]"',
  SHELL: '/bin/sh',
  BROWSER: 'chromium',
  SESSION_PREFIX: 'taskrelay-fallback',
} as const;

export const ENGINE = {
  MODEL: 'claude-3-7-sonnet-latest',
  SYSTEM_PROMPT_FILE: 'skills.md',
} as const;
