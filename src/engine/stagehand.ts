import type { Stagehand } from '@browserbasehq/stagehand';

import type { ServiceConfig } from '../schema/index.js';
import { ConfigurationError, EngineError, errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import type {
  ActOutcome,
  AgentOutcome,
  AgentRunOptions,
  BrowserEngine,
  EnginePage,
  EngineSession,
} from './client.js';

type StagehandPage = NonNullable<ReturnType<Stagehand['context']['activePage']>>;

export interface StagehandSettings {
  engine: ServiceConfig['engine'];
  agent: ServiceConfig['agent'];
  credentials: ServiceConfig['credentials'];
}

// ── Page handle ──────────────────────────────────────────────

class StagehandPageHandle implements EnginePage {
  private readonly stagehand: Stagehand;
  readonly raw: StagehandPage;

  constructor(stagehand: Stagehand, raw: StagehandPage) {
    this.stagehand = stagehand;
    this.raw = raw;
  }

  async goto(url: string, options: { timeoutMs: number }): Promise<void> {
    await this.raw.goto(url, {
      waitUntil: 'domcontentloaded',
      timeoutMs: options.timeoutMs,
    });
  }

  async act(instruction: string, options: { timeoutMs: number }): Promise<ActOutcome> {
    const result = await this.stagehand.act(instruction, {
      page: this.raw,
      timeout: options.timeoutMs,
    });
    return { success: result.success, message: result.message };
  }

  url(): string {
    return this.raw.url();
  }

  title(): Promise<string> {
    return this.raw.title();
  }
}

// ── Session ──────────────────────────────────────────────────

class StagehandSession implements EngineSession {
  private readonly settings: StagehandSettings;
  private stagehand: Stagehand | null = null;
  private closed = false;

  constructor(settings: StagehandSettings) {
    this.settings = settings;
  }

  async init(signal?: AbortSignal): Promise<void> {
    // Loaded lazily so the external-tool-only path never pulls in the engine.
    const { Stagehand } = await import('@browserbasehq/stagehand');
    this.assertOpen(signal);
    const { engine, credentials } = this.settings;

    const stagehand = new Stagehand({
      env: engine.env,
      model: credentials.modelApiKey
        ? { modelName: engine.model, apiKey: credentials.modelApiKey }
        : engine.model,
      localBrowserLaunchOptions: { headless: engine.headless },
      disableAPI: engine.disableApi,
      selfHeal: engine.selfHeal,
      domSettleTimeout: engine.domSettleTimeoutMs,
      ...(engine.systemPrompt ? { systemPrompt: engine.systemPrompt } : {}),
      ...(engine.env === 'BROWSERBASE'
        ? {
            apiKey: requireCredential(credentials.browserbaseApiKey, 'BROWSERBASE_API_KEY'),
            projectId: requireCredential(
              credentials.browserbaseProjectId,
              'BROWSERBASE_PROJECT_ID',
            ),
          }
        : {}),
    });

    try {
      await stagehand.init();
    } catch (err) {
      await shutdown(stagehand);
      throw err;
    }

    // close() or the caller's deadline may have run while the browser launched.
    if (this.closed || signal?.aborted) {
      await shutdown(stagehand);
      this.assertOpen(signal);
    }
    this.stagehand = stagehand;
  }

  async resolvePage(startUrl: string): Promise<EnginePage> {
    const stagehand = this.requireStagehand();
    const context = stagehand.context;

    const active = context.activePage();
    if (active) return new StagehandPageHandle(stagehand, active);

    const pages = context.pages();
    const last = pages[pages.length - 1];
    if (last) return new StagehandPageHandle(stagehand, last);

    const created = await context.newPage(startUrl || undefined);
    return new StagehandPageHandle(stagehand, created);
  }

  async runAgent(page: EnginePage, options: AgentRunOptions): Promise<AgentOutcome> {
    const stagehand = this.requireStagehand();
    if (!(page instanceof StagehandPageHandle)) {
      throw new EngineError('Agent requires a page resolved by this session');
    }

    const { engine, agent: agentSettings, credentials } = this.settings;
    const agent = stagehand.agent({
      model: credentials.modelApiKey
        ? { modelName: engine.agentModel, apiKey: credentials.modelApiKey }
        : engine.agentModel,
      cua: agentSettings.mode === 'cua',
      ...(engine.systemPrompt ? { systemPrompt: engine.systemPrompt } : {}),
    });

    const result = await agent.execute({
      instruction: options.instruction,
      maxSteps: options.maxSteps,
      page: page.raw,
    });
    return {
      success: result.success,
      completed: result.completed,
      message: result.message,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    const stagehand = this.stagehand;
    this.stagehand = null;
    if (stagehand) {
      await stagehand.close();
    }
  }

  private assertOpen(signal: AbortSignal | undefined): void {
    if (this.closed) {
      throw new EngineError('Stagehand session was closed during init');
    }
    if (signal?.aborted) {
      throw new EngineError('Stagehand init was abandoned');
    }
  }

  private requireStagehand(): Stagehand {
    if (!this.stagehand) {
      throw new EngineError('Stagehand session is not initialized');
    }
    return this.stagehand;
  }
}

// ── Engine ───────────────────────────────────────────────────

export function createStagehandEngine(settings: StagehandSettings): BrowserEngine {
  return {
    name: 'stagehand',
    createSession(): EngineSession {
      return new StagehandSession(settings);
    },
  };
}

// Releases a browser this session will never hand out.
async function shutdown(stagehand: Stagehand): Promise<void> {
  try {
    await stagehand.close();
  } catch (err) {
    log.warn(`Stagehand close after failed init: ${errorMessage(err)}`);
  }
}

function requireCredential(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigurationError(`${name} is required`);
  }
  return value;
}
