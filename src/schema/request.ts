import { z } from 'zod';

// ── Inbound body (POST /api/browser/run) ────────────────────
// Wire names are snake_case; everything past the boundary is camelCase.

export const MISSING_INSTRUCTION = 'Missing required field: instruction';

export const runBodySchema = z.object({
  instruction: z
    .string({ required_error: MISSING_INSTRUCTION, invalid_type_error: MISSING_INSTRUCTION })
    .trim()
    .min(1, MISSING_INSTRUCTION),
  context_text: z.string().nullish(),
  start_url: z.string().nullish(),
  max_steps: z.union([z.number(), z.string()]).nullish(),
  keep_alive: z.boolean().nullish(),
});

export type RunBody = z.infer<typeof runBodySchema>;

// ── TaskRequest ─────────────────────────────────────────────

export const taskRequestSchema = z.object({
  instruction: z.string().min(1),
  context: z.string(),
  startUrl: z.string(),
  maxSteps: z.number().int().min(1).max(200),
  keepAlive: z.boolean(),
});

export type TaskRequest = Readonly<z.infer<typeof taskRequestSchema>>;
