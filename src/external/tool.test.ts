import { describe, expect, it, vi } from 'vitest';

import { MarkerNotFoundError } from '../utils/errors.js';
import {
  buildExternalToolCommand,
  clampToolSteps,
  createSessionName,
  runExternalTool,
  shellQuote,
} from './tool.js';
import type { ExternalToolSettings, ProcessRunner } from './tool.js';

const settings: ExternalToolSettings = {
  fallbackEnabled: true,
  command: 'browser-use',
  shell: '/bin/sh',
  browser: 'chromium',
  headed: true,
  sessionPrefix: 'tr',
  graceMs: 15_000,
};

describe('shellQuote', () => {
  it('wraps in single quotes and escapes embedded ones', () => {
    expect(shellQuote('plain')).toBe("'plain'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('$(rm -rf /)')).toBe("'$(rm -rf /)'");
  });
});

describe('clampToolSteps', () => {
  it('keeps the step count within [4, 80]', () => {
    expect(clampToolSteps(1)).toBe(4);
    expect(clampToolSteps(200)).toBe(80);
    expect(clampToolSteps(12)).toBe(12);
  });
});

describe('buildExternalToolCommand', () => {
  it('opens the start URL, runs the instruction, then closes', () => {
    const command = buildExternalToolCommand(
      settings,
      { instruction: "it's done", startUrl: 'https://apple.com', maxSteps: 200 },
      'tr-1',
    );
    expect(command.split('; ')).toEqual([
      "browser-use --session 'tr-1' --browser 'chromium' --headed open 'https://apple.com'",
      "browser-use --session 'tr-1' --browser 'chromium' --headed run 'it'\\''s done' --max-steps 80",
      "browser-use --session 'tr-1' close || true",
    ]);
  });

  it('skips the open step without a start URL', () => {
    const command = buildExternalToolCommand(
      { ...settings, headed: false },
      { instruction: 'summarize this page', startUrl: '', maxSteps: 1 },
      'tr-2',
    );
    expect(command).toBe(
      "browser-use --session 'tr-2' --browser 'chromium' run 'summarize this page' --max-steps 4; " +
        "browser-use --session 'tr-2' close || true",
    );
  });
});

describe('createSessionName', () => {
  it('suffixes the prefix with the timestamp', () => {
    expect(createSessionName('tr', 42)).toBe('tr-42');
  });
});

describe('runExternalTool', () => {
  const run = { instruction: 'summarize this page', startUrl: '', maxSteps: 8 };

  it('passes the grace period and shell to the runner', async () => {
    const runner = vi.fn<ProcessRunner>(async () => ({
      stdout: 'step 1\nsuccess: True\n',
      stderr: '',
    }));

    const output = await runExternalTool(settings, 30_000, run, { runner, sessionName: 'tr-3' });

    expect(output).toBe('step 1\nsuccess: True');
    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner.mock.calls[0]?.[1]).toEqual({
      hardTimeoutMs: 45_000,
      shell: '/bin/sh',
      signal: undefined,
    });
  });

  it('fails with an excerpt when no marker is printed', async () => {
    const runner = vi.fn<ProcessRunner>(async () => ({ stdout: 'x'.repeat(1_500), stderr: '' }));

    const err: unknown = await runExternalTool(settings, 30_000, run, { runner }).then(
      () => null,
      (reason: unknown) => reason,
    );

    expect(err).toBeInstanceOf(MarkerNotFoundError);
    if (!(err instanceof MarkerNotFoundError)) return;
    expect(err.excerpt).toHaveLength(1_200);
    expect(err.message).toBe(
      `External tool did not report success. Output: ${'x'.repeat(1_200)}`,
    );
  });

  it('truncates a long successful output', async () => {
    const runner = vi.fn<ProcessRunner>(async () => ({
      stdout: `success: true ${'y'.repeat(3_000)}`,
      stderr: '',
    }));

    const output = await runExternalTool(settings, 30_000, run, { runner });
    expect(output).toHaveLength(2_000);
  });

  it('propagates runner failures', async () => {
    const runner = vi.fn<ProcessRunner>(async () => {
      throw new Error('uvx: not found');
    });

    await expect(runExternalTool(settings, 30_000, run, { runner })).rejects.toThrow(
      'uvx: not found',
    );
  });
});
