import { z } from 'zod';

import { attemptNameSchema, strategyNameSchema } from './results.js';

// ── Attempt output ──────────────────────────────────────────

export const wireAttemptSchema = z.object({
  strategy: attemptNameSchema,
  succeeded: z.boolean(),
  output_summary: z.string(),
  confirmed_url: z.string().nullable(),
  page_title: z.string().nullable(),
  raw_error: z.string().nullable(),
});

export type WireAttempt = z.infer<typeof wireAttemptSchema>;

// ── Success body ────────────────────────────────────────────

export const wireSuccessSchema = z.object({
  ok: z.literal(true),
  model: z.string(),
  engine_used: strategyNameSchema,
  task_prompt: z.string(),
  result: z.object({
    final_result: z.string(),
    confirmed_url: z.string(),
    page_title: z.string(),
    is_done: z.boolean(),
    action_error: z.string().nullable(),
    agent_error: z.string().nullable(),
    external_tool_error: z.string().nullable(),
    fallback_used: z.boolean(),
    external_tool_fallback_used: z.boolean(),
    attempts: z.array(wireAttemptSchema),
  }),
});

export type WireSuccess = z.infer<typeof wireSuccessSchema>;

// ── Error body ──────────────────────────────────────────────

export const wireErrorSchema = z.object({
  ok: z.literal(false),
  error: z.string().min(1),
});

export type WireError = z.infer<typeof wireErrorSchema>;
