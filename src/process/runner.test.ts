import { describe, expect, it } from 'vitest';

import { NonZeroExitError, TimeoutError } from '../utils/errors.js';
import { combineOutput, hasSuccessMarker, runProcess } from './runner.js';

const SHELL = '/bin/sh';

describe('runProcess', () => {
  it('collects stdout of a clean exit', async () => {
    const output = await runProcess('echo "success: true"', { hardTimeoutMs: 5_000, shell: SHELL });
    expect(output).toEqual({ stdout: 'success: true\n', stderr: '' });
  });

  it('rejects a non-zero exit with stderr as the message', async () => {
    const run = runProcess('echo boom >&2; exit 3', { hardTimeoutMs: 5_000, shell: SHELL });
    await expect(run).rejects.toBeInstanceOf(NonZeroExitError);
    await expect(run).rejects.toMatchObject({ message: 'boom', exitCode: 3 });
  });

  it('names the exit code when the command printed nothing', async () => {
    await expect(runProcess('exit 2', { hardTimeoutMs: 5_000, shell: SHELL })).rejects.toThrow(
      'Command failed with exit code 2',
    );
  });

  it('names the signal when the command is killed', async () => {
    const run = runProcess('kill -9 $$', { hardTimeoutMs: 5_000, shell: SHELL });
    await expect(run).rejects.toMatchObject({
      message: 'Command terminated by SIGKILL',
      exitCode: null,
    });
  });

  it('kills the command at the hard limit', async () => {
    const startedAt = Date.now();
    const run = runProcess('sleep 5', { hardTimeoutMs: 200, shell: SHELL });

    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    await expect(run).rejects.toThrow('Command timed out after 200ms');
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort(new Error('request cancelled'));
    await expect(
      runProcess('sleep 5', { hardTimeoutMs: 5_000, shell: SHELL, signal: controller.signal }),
    ).rejects.toThrow('request cancelled');
  });
});

describe('hasSuccessMarker', () => {
  it('matches either marker in any case', () => {
    expect(hasSuccessMarker('step 3\nSuccess: True')).toBe(true);
    expect(hasSuccessMarker('done:true')).toBe(true);
  });

  it('rejects output without a positive marker', () => {
    expect(hasSuccessMarker('success: false')).toBe(false);
    expect(hasSuccessMarker('')).toBe(false);
  });
});

describe('combineOutput', () => {
  it('joins both streams and trims', () => {
    expect(combineOutput({ stdout: 'a\n', stderr: '' })).toBe('a');
    expect(combineOutput({ stdout: 'a', stderr: 'b\n' })).toBe('a\nb');
  });
});
