// ── Error taxonomy ───────────────────────────────────────────
// Every class sets `name` so logs and attempt records stay readable
// after the error has been flattened into a message string.

/** Missing credential or invalid setting. Fatal, raised before any attempt. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Request rejected before any engine is touched. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class TimeoutError extends Error {
  readonly durationMs: number;

  constructor(message: string, durationMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.durationMs = durationMs;
  }
}

export class NonZeroExitError extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null) {
    super(message);
    this.name = 'NonZeroExitError';
    this.exitCode = exitCode;
  }
}

/** Subprocess exited cleanly but printed no success marker. */
export class MarkerNotFoundError extends Error {
  readonly excerpt: string;

  constructor(label: string, excerpt: string) {
    super(`${label} did not report success. Output: ${excerpt}`);
    this.name = 'MarkerNotFoundError';
    this.excerpt = excerpt;
  }
}

/** The scriptable engine resolved, but reported that it did not succeed. */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

/** The engine session could not be brought up (init, page, navigation). */
export class SessionError extends Error {
  readonly phase: 'init' | 'page' | 'navigation';

  constructor(phase: SessionError['phase'], cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = 'SessionError';
    this.phase = phase;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
