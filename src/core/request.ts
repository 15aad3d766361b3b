import { LIMITS } from '../config/defaults.js';
import { MISSING_INSTRUCTION, runBodySchema } from '../schema/index.js';
import type { TaskRequest } from '../schema/index.js';
import { InvalidRequestError } from '../utils/errors.js';
import { deriveStartUrl } from './composer.js';

// ── Step clamping ────────────────────────────────────────────

/** Missing, zero or non-numeric → default; otherwise truncated into [1, 200]. */
export function clampMaxSteps(value: number | string | null | undefined): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (parsed === null || parsed === undefined || !Number.isFinite(parsed) || parsed === 0) {
    return LIMITS.DEFAULT_MAX_STEPS;
  }
  return Math.max(
    LIMITS.MIN_MAX_STEPS,
    Math.min(LIMITS.MAX_MAX_STEPS, Math.trunc(parsed)),
  );
}

// ── TaskRequest construction ─────────────────────────────────

export interface TaskRequestInput {
  instruction: string;
  context?: string | undefined;
  startUrl?: string | undefined;
  maxSteps?: number | string | null | undefined;
  keepAlive?: boolean | undefined;
}

/**
 * Normalize caller input into an immutable TaskRequest.
 * The start URL is derived from instruction, then context, when not given.
 */
export function createTaskRequest(input: TaskRequestInput): TaskRequest {
  const instruction = input.instruction.trim();
  if (!instruction) {
    throw new InvalidRequestError(MISSING_INSTRUCTION);
  }

  const context = input.context ?? '';
  const startUrl = input.startUrl?.trim() || deriveStartUrl(instruction, context);

  return Object.freeze({
    instruction,
    context,
    startUrl,
    maxSteps: clampMaxSteps(input.maxSteps),
    keepAlive: input.keepAlive ?? false,
  });
}

/** Parse a wire body. Throws `InvalidRequestError` with the client-facing message. */
export function parseRunBody(body: unknown): TaskRequest {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new InvalidRequestError('Expected JSON body');
  }

  const result = runBodySchema.safeParse(body);
  if (!result.success) {
    const instructionIssue = result.error.issues.some(
      (issue) => issue.path[0] === 'instruction',
    );
    if (instructionIssue) {
      throw new InvalidRequestError(MISSING_INSTRUCTION);
    }
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidRequestError(`Invalid request body: ${details}`);
  }

  const data = result.data;
  return createTaskRequest({
    instruction: data.instruction,
    context: data.context_text ?? undefined,
    startUrl: data.start_url ?? undefined,
    maxSteps: data.max_steps,
    keepAlive: data.keep_alive ?? undefined,
  });
}
