import { z } from 'zod';

// ── Enumerations ────────────────────────────────────────────

export const primaryEngineSchema = z.enum(['external-tool', 'engine']);

export type PrimaryEngine = z.infer<typeof primaryEngineSchema>;

export const engineProviderSchema = z.enum(['stagehand', 'mock']);

export type EngineProvider = z.infer<typeof engineProviderSchema>;

export const executionStrategySchema = z.enum(['deterministic_first', 'agent_first']);

export type ExecutionStrategy = z.infer<typeof executionStrategySchema>;

export const agentModeSchema = z.enum(['dom', 'hybrid', 'cua']);

export type AgentMode = z.infer<typeof agentModeSchema>;

export const engineEnvSchema = z.enum(['LOCAL', 'BROWSERBASE']);

export type EngineEnv = z.infer<typeof engineEnvSchema>;

export const modelProviderSchema = z.enum(['anthropic', 'openai']);

export type ModelProvider = z.infer<typeof modelProviderSchema>;

// ── Timeout budgets ─────────────────────────────────────────

export const budgetNameSchema = z.enum([
  'init',
  'navigation',
  'action',
  'agent',
  'externalTool',
  'overall',
]);

export type BudgetName = z.infer<typeof budgetNameSchema>;

const durationSchema = z.number().int().positive();

export const timeoutsSchema = z.object({
  overall: durationSchema,
  init: durationSchema,
  navigation: durationSchema,
  action: durationSchema,
  agent: durationSchema,
  externalTool: durationSchema,
});

export type Timeouts = z.infer<typeof timeoutsSchema>;

// ── Config file (.taskrelay.yaml) ───────────────────────────
// Every key optional: the file only overrides defaults, env overrides the file.

export const fileConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).optional(),
      port: z.number().int().min(0).max(65_535).optional(),
    })
    .optional(),
  primaryEngine: primaryEngineSchema.optional(),
  engineProvider: engineProviderSchema.optional(),
  executionStrategy: executionStrategySchema.optional(),
  agent: z
    .object({
      enabled: z.boolean().optional(),
      mode: agentModeSchema.optional(),
    })
    .optional(),
  retries: z
    .object({
      count: z.number().int().nonnegative().optional(),
      backoffMs: z.number().int().nonnegative().optional(),
    })
    .optional(),
  timeouts: timeoutsSchema.partial().optional(),
  externalTool: z
    .object({
      fallbackEnabled: z.boolean().optional(),
      command: z.string().min(1).optional(),
      shell: z.string().min(1).optional(),
      browser: z.string().min(1).optional(),
      headed: z.boolean().optional(),
      sessionPrefix: z.string().min(1).optional(),
    })
    .optional(),
  engine: z
    .object({
      env: engineEnvSchema.optional(),
      modelProvider: modelProviderSchema.optional(),
      model: z.string().min(1).optional(),
      agentModel: z.string().min(1).optional(),
      headless: z.boolean().optional(),
      disableApi: z.boolean().optional(),
      selfHeal: z.boolean().optional(),
      domSettleTimeoutMs: z.number().int().positive().optional(),
      systemPromptPath: z.string().min(1).optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved service config ─────────────────────────────────

export const serviceConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65_535),
  }),
  primaryEngine: primaryEngineSchema,
  engineProvider: engineProviderSchema,
  executionStrategy: executionStrategySchema,
  agent: z.object({
    enabled: z.boolean(),
    mode: agentModeSchema,
  }),
  retries: z.object({
    count: z.number().int().nonnegative(),
    backoffMs: z.number().int().nonnegative(),
  }),
  timeouts: timeoutsSchema,
  externalTool: z.object({
    fallbackEnabled: z.boolean(),
    command: z.string().min(1),
    shell: z.string().min(1),
    browser: z.string().min(1),
    headed: z.boolean(),
    sessionPrefix: z.string().min(1),
    graceMs: z.number().int().nonnegative(),
  }),
  engine: z.object({
    env: engineEnvSchema,
    modelProvider: modelProviderSchema,
    model: z.string().min(1),
    agentModel: z.string().min(1),
    headless: z.boolean(),
    disableApi: z.boolean(),
    selfHeal: z.boolean(),
    domSettleTimeoutMs: z.number().int().positive(),
    systemPromptPath: z.string().min(1),
    systemPrompt: z.string(),
  }),
  credentials: z.object({
    modelApiKey: z.string().min(1).optional(),
    browserbaseApiKey: z.string().min(1).optional(),
    browserbaseProjectId: z.string().min(1).optional(),
  }),
});

export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
