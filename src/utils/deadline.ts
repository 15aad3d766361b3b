import { TimeoutError } from './errors.js';

// ── Deadlines ────────────────────────────────────────────────
// A deadline is an AbortSignal that fires after `ms`, or earlier when its
// parent fires. Work that accepts the signal can stop itself; work that
// ignores it is abandoned by `raceSignal`.

export interface Deadline {
  readonly signal: AbortSignal;
  dispose(): void;
}

export function createDeadline(
  ms: number,
  label: string,
  parent?: AbortSignal,
): Deadline {
  const controller = new AbortController();

  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`${label} timed out after ${String(ms)}ms`, ms));
  }, ms);

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose(): void {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Settles with `work`, or rejects with the signal's reason if it aborts first. */
export function raceSignal<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep the abandoned promise from surfacing as an unhandled rejection.
    work.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Timer-backed wait that ends early (rejecting) when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const wait = new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
  return signal ? raceSignal(wait, signal) : wait;
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}
