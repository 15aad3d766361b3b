// ── Engine interfaces ────────────────────────────────────────
// The orchestrator only relies on these signatures. Adapters map them onto
// a concrete scriptable engine; none of them enforce timeouts themselves.

export interface ActOutcome {
  success: boolean;
  message: string;
}

export interface AgentOutcome {
  success: boolean;
  completed: boolean;
  message: string;
}

export interface AgentRunOptions {
  instruction: string;
  maxSteps: number;
}

export interface EnginePage {
  goto(url: string, options: { timeoutMs: number }): Promise<void>;
  /** Single deterministic action described in natural language. */
  act(instruction: string, options: { timeoutMs: number }): Promise<ActOutcome>;
  url(): string;
  title(): Promise<string>;
}

/** One browser session, exclusively owned by one orchestration run. */
export interface EngineSession {
  /** An aborted `signal` means the caller gave up; the session must not stay open. */
  init(signal?: AbortSignal): Promise<void>;
  resolvePage(startUrl: string): Promise<EnginePage>;
  runAgent(page: EnginePage, options: AgentRunOptions): Promise<AgentOutcome>;
  close(): Promise<void>;
}

export interface BrowserEngine {
  readonly name: string;
  createSession(): EngineSession;
}
