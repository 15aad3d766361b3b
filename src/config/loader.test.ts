import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../utils/errors.js';
import {
  loadConfigFile,
  loadOptionalConfigFile,
  loadServiceConfig,
  qualifyModelName,
} from './loader.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'taskrelay-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadServiceConfig', () => {
  it('applies the defaults', async () => {
    const config = await loadServiceConfig({}, {}, dir);

    expect(config.server).toEqual({ host: '0.0.0.0', port: 8010 });
    expect(config.primaryEngine).toBe('external-tool');
    expect(config.engineProvider).toBe('stagehand');
    expect(config.executionStrategy).toBe('deterministic_first');
    expect(config.agent).toEqual({ enabled: false, mode: 'hybrid' });
    expect(config.retries).toEqual({ count: 1, backoffMs: 1_200 });
    expect(config.engine.model).toBe('anthropic/claude-3-7-sonnet-latest');
    expect(config.engine.agentModel).toBe('anthropic/claude-3-7-sonnet-latest');
    expect(config.engine.systemPromptPath).toBe(path.join(dir, 'skills.md'));
    expect(config.engine.systemPrompt).toBe('');
    expect(config.externalTool.fallbackEnabled).toBe(true);
    expect(config.credentials.modelApiKey).toBeUndefined();
  });

  it('lets the environment override the file', async () => {
    const file = { server: { port: 9_000 }, agent: { enabled: true } };

    expect((await loadServiceConfig({}, file, dir)).server.port).toBe(9_000);

    const config = await loadServiceConfig(
      { BROWSER_SERVICE_PORT: '9100', BROWSER_STAGEHAND_ENABLE_AGENT: 'false' },
      file,
      dir,
    );
    expect(config.server.port).toBe(9_100);
    expect(config.agent.enabled).toBe(false);
  });

  it('maps primary engine aliases', async () => {
    const engine = await loadServiceConfig({ BROWSER_PRIMARY_ENGINE: 'Stagehand' }, {}, dir);
    const tool = await loadServiceConfig({ BROWSER_PRIMARY_ENGINE: 'browser_use' }, {}, dir);

    expect(engine.primaryEngine).toBe('engine');
    expect(tool.primaryEngine).toBe('external-tool');
  });

  it('rejects an unknown primary engine', async () => {
    await expect(
      loadServiceConfig({ BROWSER_PRIMARY_ENGINE: 'selenium' }, {}, dir),
    ).rejects.toThrow(
      new ConfigurationError(
        'BROWSER_PRIMARY_ENGINE must be one of browser_use, stagehand; got "selenium"',
      ),
    );
  });

  it('rejects a non-numeric timeout', async () => {
    await expect(
      loadServiceConfig({ BROWSER_STAGEHAND_TIMEOUT_MS: 'soon' }, {}, dir),
    ).rejects.toThrow('BROWSER_STAGEHAND_TIMEOUT_MS must be a number, got "soon"');
  });

  it('raises budgets below their floors', async () => {
    const config = await loadServiceConfig(
      {
        BROWSER_STAGEHAND_TIMEOUT_MS: '1000',
        BROWSER_STAGEHAND_INIT_TIMEOUT_MS: '10',
        BROWSER_STAGEHAND_DOM_SETTLE_TIMEOUT_MS: '100',
      },
      {},
      dir,
    );

    expect(config.timeouts).toEqual({
      overall: 15_000,
      init: 5_000,
      navigation: 30_000,
      action: 15_000,
      agent: 15_000,
      externalTool: 15_000,
    });
    expect(config.engine.domSettleTimeoutMs).toBe(500);
  });

  it('reads the key that matches the model provider', async () => {
    const config = await loadServiceConfig(
      {
        STAGEHAND_MODEL_PROVIDER: 'openai',
        STAGEHAND_MODEL: 'gpt-4o',
        OPENAI_API_KEY: 'test-secret',
        ANTHROPIC_API_KEY: 'other-secret',
      },
      {},
      dir,
    );

    expect(config.engine.model).toBe('openai/gpt-4o');
    expect(config.credentials.modelApiKey).toBe('test-secret');
  });

  it('only treats "true" as an enabled flag', async () => {
    const upper = await loadServiceConfig({ BROWSER_STAGEHAND_ENABLE_AGENT: 'TRUE' }, {}, dir);
    const yes = await loadServiceConfig({ BROWSER_STAGEHAND_ENABLE_AGENT: 'yes' }, {}, dir);

    expect(upper.agent.enabled).toBe(true);
    expect(yes.agent.enabled).toBe(false);
  });

  it('loads and trims the system prompt file', async () => {
    await writeFile(path.join(dir, 'skills.md'), '  Prefer visible buttons.\n');

    const config = await loadServiceConfig({}, {}, dir);

    expect(config.engine.systemPrompt).toBe('Prefer visible buttons.');
  });

  it('freezes nested sections', async () => {
    const config = await loadServiceConfig({}, {}, dir);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
  });
});

describe('qualifyModelName', () => {
  it('prefixes bare names only', () => {
    expect(qualifyModelName('gpt-4o', 'openai')).toBe('openai/gpt-4o');
    expect(qualifyModelName('anthropic/claude-x', 'openai')).toBe('anthropic/claude-x');
  });
});

describe('loadConfigFile', () => {
  it('parses YAML', async () => {
    const file = path.join(dir, '.taskrelay.yaml');
    await writeFile(file, 'primaryEngine: engine\nagent:\n  enabled: true\n');

    await expect(loadConfigFile(file)).resolves.toEqual({
      primaryEngine: 'engine',
      agent: { enabled: true },
    });
  });

  it('parses JSON', async () => {
    const file = path.join(dir, 'taskrelay.json');
    await writeFile(file, JSON.stringify({ retries: { count: 3 } }));

    await expect(loadConfigFile(file)).resolves.toEqual({ retries: { count: 3 } });
  });

  it('rejects invalid values', async () => {
    const file = path.join(dir, '.taskrelay.yaml');
    await writeFile(file, 'retries:\n  count: -1\n');

    await expect(loadConfigFile(file)).rejects.toThrow();
  });

  it('treats a missing optional file as empty', async () => {
    await expect(loadOptionalConfigFile(path.join(dir, 'absent.yaml'))).resolves.toEqual({});
  });
});
