import type {
  ActOutcome,
  AgentOutcome,
  AgentRunOptions,
  BrowserEngine,
  EnginePage,
  EngineSession,
} from './client.js';

export type MockCall =
  | { kind: 'init' }
  | { kind: 'resolvePage'; startUrl: string }
  | { kind: 'goto'; url: string; timeoutMs: number }
  | { kind: 'act'; instruction: string; timeoutMs: number }
  | { kind: 'agent'; instruction: string; maxSteps: number }
  | { kind: 'title' }
  | { kind: 'close' };

/** Every hook is optional; unset hooks succeed immediately. */
export interface MockScript {
  init?: (signal?: AbortSignal) => Promise<void>;
  goto?: (url: string) => Promise<void>;
  /** `call` counts act invocations across the whole engine, from 0. */
  act?: (instruction: string, call: number) => Promise<ActOutcome>;
  agent?: (options: AgentRunOptions) => Promise<AgentOutcome>;
  close?: () => Promise<void>;
  url?: string;
  /** Replaces the tracked URL on reads; may throw. */
  pageUrl?: () => string;
  title?: string;
}

export interface MockEngine extends BrowserEngine {
  /** Calls in the order they were made, across every session. */
  readonly calls: MockCall[];
  readonly sessionCount: number;
}

/**
 * In-process engine for tests and dry runs.
 * Scripted hooks decide each outcome; calls are recorded for assertions.
 */
export function createMockEngine(script: MockScript = {}): MockEngine {
  const calls: MockCall[] = [];
  let actCount = 0;
  let sessionCount = 0;
  let currentUrl = script.url ?? 'about:blank';

  const page: EnginePage = {
    async goto(url: string, options: { timeoutMs: number }): Promise<void> {
      calls.push({ kind: 'goto', url, timeoutMs: options.timeoutMs });
      await script.goto?.(url);
      currentUrl = script.url ?? url;
    },

    async act(instruction: string, options: { timeoutMs: number }): Promise<ActOutcome> {
      calls.push({ kind: 'act', instruction, timeoutMs: options.timeoutMs });
      const call = actCount;
      actCount++;
      if (script.act) return script.act(instruction, call);
      return { success: true, message: `Mock action completed: ${instruction}` };
    },

    url(): string {
      return script.pageUrl ? script.pageUrl() : currentUrl;
    },

    async title(): Promise<string> {
      calls.push({ kind: 'title' });
      return script.title ?? 'Mock Page';
    },
  };

  const createSession = (): EngineSession => {
    sessionCount++;
    return {
      async init(signal?: AbortSignal): Promise<void> {
        calls.push({ kind: 'init' });
        await script.init?.(signal);
      },

      async resolvePage(startUrl: string): Promise<EnginePage> {
        calls.push({ kind: 'resolvePage', startUrl });
        return page;
      },

      async runAgent(_page: EnginePage, options: AgentRunOptions): Promise<AgentOutcome> {
        calls.push({
          kind: 'agent',
          instruction: options.instruction,
          maxSteps: options.maxSteps,
        });
        if (script.agent) return script.agent(options);
        return { success: true, completed: true, message: 'Mock agent completed the task.' };
      },

      async close(): Promise<void> {
        calls.push({ kind: 'close' });
        await script.close?.();
      },
    };
  };

  return {
    name: 'mock',
    calls,
    get sessionCount(): number {
      return sessionCount;
    },
    createSession,
  };
}
