import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadServiceConfig } from '../config/index.js';
import type { Env } from '../config/index.js';
import type { ServiceConfig } from '../schema/index.js';
import { assertEngineCredentials, createEngine, createMockEngine } from './index.js';

const NO_PROMPT_DIR = path.join(tmpdir(), 'taskrelay-no-such-dir');

function configFor(env: Env): Promise<Readonly<ServiceConfig>> {
  return loadServiceConfig(env, {}, NO_PROMPT_DIR);
}

describe('assertEngineCredentials', () => {
  it('requires the model key of the configured provider', async () => {
    const anthropic = await configFor({});
    expect(() => assertEngineCredentials(anthropic)).toThrow(
      'ANTHROPIC_API_KEY is required',
    );
    const openai = await configFor({ STAGEHAND_MODEL_PROVIDER: 'openai' });
    expect(() => assertEngineCredentials(openai)).toThrow('OPENAI_API_KEY is required');
  });

  it('requires Browserbase credentials for the hosted environment', async () => {
    const noKey = await configFor({
      ANTHROPIC_API_KEY: 'test-secret',
      STAGEHAND_ENV: 'browserbase',
    });
    expect(() => assertEngineCredentials(noKey)).toThrow('BROWSERBASE_API_KEY is required');

    const noProject = await configFor({
      ANTHROPIC_API_KEY: 'test-secret',
      STAGEHAND_ENV: 'BROWSERBASE',
      BROWSERBASE_API_KEY: 'test-secret',
    });
    expect(() => assertEngineCredentials(noProject)).toThrow(
      'BROWSERBASE_PROJECT_ID is required',
    );
  });

  it('accepts a complete local configuration', async () => {
    const config = await configFor({ ANTHROPIC_API_KEY: 'test-secret' });
    expect(() => assertEngineCredentials(config)).not.toThrow();
  });

  it('skips the check for the mock provider', async () => {
    const config = await configFor({ BROWSER_ENGINE_PROVIDER: 'mock' });
    expect(() => assertEngineCredentials(config)).not.toThrow();
  });
});

describe('createEngine', () => {
  it('selects the provider from config', async () => {
    expect(createEngine(await configFor({ BROWSER_ENGINE_PROVIDER: 'mock' })).name).toBe('mock');
    expect(createEngine(await configFor({})).name).toBe('stagehand');
  });
});

describe('createMockEngine', () => {
  it('records calls and follows navigation', async () => {
    const engine = createMockEngine({ title: 'Pricing' });
    const session = engine.createSession();
    await session.init();
    const page = await session.resolvePage('https://shop.test');
    await page.goto('https://shop.test/pricing', { timeoutMs: 100 });

    expect(page.url()).toBe('https://shop.test/pricing');
    await expect(page.title()).resolves.toBe('Pricing');
    await expect(page.act('Click "Buy"', { timeoutMs: 100 })).resolves.toEqual({
      success: true,
      message: 'Mock action completed: Click "Buy"',
    });
    expect(engine.calls.map((call) => call.kind)).toEqual([
      'init',
      'resolvePage',
      'goto',
      'title',
      'act',
    ]);
  });
});
