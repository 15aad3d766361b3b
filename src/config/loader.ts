import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import {
  agentModeSchema,
  engineEnvSchema,
  engineProviderSchema,
  executionStrategySchema,
  fileConfigSchema,
  modelProviderSchema,
  serviceConfigSchema,
} from '../schema/config.js';
import type { FileConfig, PrimaryEngine, ServiceConfig } from '../schema/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { resolveTimeouts } from './budgets.js';
import { ENGINE, EXTERNAL_TOOL, LIMITS, SERVER, TIMEOUTS } from './defaults.js';

export type Env = Readonly<Record<string, string | undefined>>;

// ── Config file ─────────────────────────────────────────────

/**
 * Load and validate a `.taskrelay.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

/** Like `loadConfigFile`, but a file that does not exist yields `{}`. */
export async function loadOptionalConfigFile(configPath: string): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
}

// ── Env readers ─────────────────────────────────────────────

function envString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envNumber(env: Env, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const value = envString(env, name);
  return value === undefined ? undefined : value.toLowerCase() === 'true';
}

// ── Primary engine aliases ──────────────────────────────────

const PRIMARY_ENGINE_ALIASES: Readonly<Record<string, PrimaryEngine>> = {
  browser_use: 'external-tool',
  'browser-use': 'external-tool',
  'external-tool': 'external-tool',
  stagehand: 'engine',
  engine: 'engine',
};

function parsePrimaryEngine(value: string): PrimaryEngine {
  const engine = PRIMARY_ENGINE_ALIASES[value.toLowerCase()];
  if (engine === undefined) {
    throw new ConfigurationError(
      `BROWSER_PRIMARY_ENGINE must be one of browser_use, stagehand; got "${value}"`,
    );
  }
  return engine;
}

// ── Model names ─────────────────────────────────────────────

/** Stagehand wants `provider/model`; bare names get the configured provider. */
export function qualifyModelName(model: string, provider: string): string {
  return model.includes('/') ? model : `${provider}/${model}`;
}

// ── Service config ──────────────────────────────────────────

/**
 * Build the immutable service config.
 * Precedence: defaults < config file < environment. Read once at startup
 * and passed explicitly; nothing downstream reads `process.env`.
 */
export async function loadServiceConfig(
  env: Env,
  file: FileConfig = {},
  cwd: string = process.cwd(),
): Promise<Readonly<ServiceConfig>> {
  const primaryRaw = envString(env, 'BROWSER_PRIMARY_ENGINE');
  const modelProvider = modelProviderSchema.parse(
    envString(env, 'STAGEHAND_MODEL_PROVIDER')?.toLowerCase() ??
      file.engine?.modelProvider ??
      'anthropic',
  );
  const model = qualifyModelName(
    envString(env, 'STAGEHAND_MODEL') ?? file.engine?.model ?? ENGINE.MODEL,
    modelProvider,
  );
  const agentModel = qualifyModelName(
    envString(env, 'STAGEHAND_AGENT_MODEL') ?? file.engine?.agentModel ?? model,
    modelProvider,
  );
  const systemPromptPath = path.resolve(
    cwd,
    envString(env, 'BROWSER_SYSTEM_PROMPT_PATH') ??
      file.engine?.systemPromptPath ??
      ENGINE.SYSTEM_PROMPT_FILE,
  );

  const candidate = {
    server: {
      host: envString(env, 'BROWSER_SERVICE_HOST') ?? file.server?.host ?? SERVER.HOST,
      port: envNumber(env, 'BROWSER_SERVICE_PORT') ?? file.server?.port ?? SERVER.PORT,
    },
    primaryEngine:
      primaryRaw !== undefined
        ? parsePrimaryEngine(primaryRaw)
        : file.primaryEngine ?? 'external-tool',
    engineProvider: engineProviderSchema.parse(
      envString(env, 'BROWSER_ENGINE_PROVIDER')?.toLowerCase() ??
        file.engineProvider ??
        'stagehand',
    ),
    executionStrategy: executionStrategySchema.parse(
      envString(env, 'BROWSER_STAGEHAND_EXECUTION_STRATEGY')?.toLowerCase() ??
        file.executionStrategy ??
        'deterministic_first',
    ),
    agent: {
      enabled:
        envBoolean(env, 'BROWSER_STAGEHAND_ENABLE_AGENT') ?? file.agent?.enabled ?? false,
      mode: agentModeSchema.parse(
        envString(env, 'BROWSER_STAGEHAND_AGENT_MODE')?.toLowerCase() ??
          file.agent?.mode ??
          'hybrid',
      ),
    },
    retries: {
      count: Math.max(
        0,
        envNumber(env, 'BROWSER_STAGEHAND_RETRIES') ?? file.retries?.count ?? LIMITS.RETRIES,
      ),
      backoffMs: Math.max(
        0,
        envNumber(env, 'BROWSER_STAGEHAND_RETRY_BACKOFF_MS') ??
          file.retries?.backoffMs ??
          LIMITS.RETRY_BACKOFF,
      ),
    },
    timeouts: resolveTimeouts({
      overall: envNumber(env, 'BROWSER_STAGEHAND_TIMEOUT_MS') ?? file.timeouts?.overall,
      init: envNumber(env, 'BROWSER_STAGEHAND_INIT_TIMEOUT_MS') ?? file.timeouts?.init,
      navigation:
        envNumber(env, 'BROWSER_STAGEHAND_NAV_TIMEOUT_MS') ?? file.timeouts?.navigation,
      action: envNumber(env, 'BROWSER_STAGEHAND_ACT_TIMEOUT_MS') ?? file.timeouts?.action,
      agent: envNumber(env, 'BROWSER_STAGEHAND_AGENT_TIMEOUT_MS') ?? file.timeouts?.agent,
      externalTool: envNumber(env, 'BROWSER_USE_TIMEOUT_MS') ?? file.timeouts?.externalTool,
    }),
    externalTool: {
      fallbackEnabled:
        envBoolean(env, 'BROWSER_ENABLE_BROWSER_USE_FALLBACK') ??
        file.externalTool?.fallbackEnabled ??
        true,
      command:
        envString(env, 'BROWSER_USE_COMMAND') ?? file.externalTool?.command ?? EXTERNAL_TOOL.COMMAND,
      shell: envString(env, 'BROWSER_USE_SHELL') ?? file.externalTool?.shell ?? EXTERNAL_TOOL.SHELL,
      browser: file.externalTool?.browser ?? EXTERNAL_TOOL.BROWSER,
      headed: envBoolean(env, 'BROWSER_USE_HEADED') ?? file.externalTool?.headed ?? true,
      sessionPrefix:
        envString(env, 'BROWSER_USE_SESSION_PREFIX') ??
        file.externalTool?.sessionPrefix ??
        EXTERNAL_TOOL.SESSION_PREFIX,
      graceMs: TIMEOUTS.EXTERNAL_TOOL_GRACE,
    },
    engine: {
      env: engineEnvSchema.parse(
        envString(env, 'STAGEHAND_ENV')?.toUpperCase() ?? file.engine?.env ?? 'LOCAL',
      ),
      modelProvider,
      model,
      agentModel,
      headless:
        envBoolean(env, 'BROWSER_STAGEHAND_HEADLESS') ?? file.engine?.headless ?? false,
      disableApi:
        envBoolean(env, 'BROWSER_STAGEHAND_DISABLE_API') ?? file.engine?.disableApi ?? true,
      selfHeal: envBoolean(env, 'BROWSER_STAGEHAND_SELF_HEAL') ?? file.engine?.selfHeal ?? true,
      domSettleTimeoutMs: Math.max(
        LIMITS.MIN_DOM_SETTLE_TIMEOUT,
        envNumber(env, 'BROWSER_STAGEHAND_DOM_SETTLE_TIMEOUT_MS') ??
          file.engine?.domSettleTimeoutMs ??
          TIMEOUTS.DOM_SETTLE_TIMEOUT,
      ),
      systemPromptPath,
      systemPrompt: await readSystemPrompt(systemPromptPath),
    },
    credentials: {
      modelApiKey: envString(
        env,
        modelProvider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY',
      ),
      browserbaseApiKey: envString(env, 'BROWSERBASE_API_KEY'),
      browserbaseProjectId: envString(env, 'BROWSERBASE_PROJECT_ID'),
    },
  };

  const result = serviceConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return deepFreeze(result.data);
}

// ── Helpers ─────────────────────────────────────────────────

async function readSystemPrompt(promptPath: string): Promise<string> {
  try {
    return (await readFile(promptPath, 'utf-8')).trim();
  } catch (err) {
    if (isMissingFile(err)) return '';
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
