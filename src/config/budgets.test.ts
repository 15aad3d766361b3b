import { getEventListeners } from 'node:events';

import { describe, expect, it } from 'vitest';

import { TimeoutError } from '../utils/errors.js';
import { sleep } from '../utils/deadline.js';
import { effectiveBudget, resolveTimeouts, TimeoutBudgets } from './budgets.js';

describe('effectiveBudget', () => {
  it('enforces the floor', () => {
    expect(effectiveBudget(5_000, 100, 20_000)).toBe(5_000);
  });

  it('uses the fallback for missing or non-finite values', () => {
    expect(effectiveBudget(5_000, undefined, 20_000)).toBe(20_000);
    expect(effectiveBudget(5_000, Number.NaN, 7_000)).toBe(7_000);
  });
});

describe('resolveTimeouts', () => {
  it('returns the defaults', () => {
    expect(resolveTimeouts({})).toEqual({
      overall: 60_000,
      init: 20_000,
      navigation: 30_000,
      action: 25_000,
      agent: 35_000,
      externalTool: 60_000,
    });
  });

  it('caps derived defaults at the overall budget', () => {
    const timeouts = resolveTimeouts({ overall: 20_000 });
    expect(timeouts.action).toBe(20_000);
    expect(timeouts.agent).toBe(20_000);
    expect(timeouts.externalTool).toBe(20_000);
  });
});

describe('TimeoutBudgets', () => {
  const budgets = new TimeoutBudgets({
    overall: 1_000,
    init: 30,
    navigation: 30,
    action: 30,
    agent: 30,
    externalTool: 30,
  });

  it('resolves work that finishes in time', async () => {
    await expect(budgets.run('action', 'Quick step', async () => 'ok')).resolves.toBe('ok');
  });

  it('rejects with a labelled TimeoutError and aborts the work signal', async () => {
    let seen: AbortSignal | undefined;
    const pending = budgets.run('init', 'Engine init', (signal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toThrow(new TimeoutError('Engine init timed out after 30ms', 30));
    expect(seen?.aborted).toBe(true);
  });

  it('turns a synchronous throw into a rejection', async () => {
    await expect(
      budgets.run('action', 'Throws', () => {
        throw new Error('sync failure');
      }),
    ).rejects.toThrow('sync failure');
  });

  it('follows an already-aborted parent', async () => {
    const parent = new AbortController();
    parent.abort(new Error('request cancelled'));

    await expect(
      budgets.runFor(1_000, 'Child', () => new Promise<never>(() => undefined), parent.signal),
    ).rejects.toThrow('request cancelled');
  });
});

describe('sleep', () => {
  it('rejects when its signal aborts', async () => {
    const controller = new AbortController();
    const waiting = sleep(5_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(waiting).rejects.toThrow('stop');
  });

  it('detaches from the signal once the wait is over', async () => {
    const controller = new AbortController();
    await sleep(5, controller.signal);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });
});
