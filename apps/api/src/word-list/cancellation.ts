// setTimeout fires at once for delays above this
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type FetchSignal = {
  signal: AbortSignal;
  dispose(): void;
};

/**
 * Links an optional caller signal with an optional deadline into one signal.
 * Call dispose() when the fetch ends so the deadline timer does not linger.
 */
export function linkSignal(parent?: AbortSignal, timeoutMs?: number): FetchSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      const onAbort = () => controller.abort(parent.reason);
      parent.addEventListener("abort", onAbort, { once: true });
      cleanups.push(() => parent.removeEventListener("abort", onAbort));
    }
  }

  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      controller.abort(new DeadlineExceeded(timeoutMs));
    }, Math.min(timeoutMs, MAX_TIMEOUT_MS));
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const fn of cleanups) fn();
    },
  };
}

export class DeadlineExceeded extends Error {
  constructor(readonly timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceeded";
  }
}

/** True for the abort itself, not for an unrelated failure that raced it. */
export function isAbortError(err: unknown, signal?: AbortSignal) {
  if (err instanceof DeadlineExceeded) return true;
  if (err instanceof Error && err.name === "AbortError") return true;
  return signal !== undefined && signal.aborted && err === signal.reason;
}

/**
 * Settles with `promise`, or rejects with the abort reason as soon as `signal`
 * aborts. The underlying work keeps running for whoever else awaits it.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(signal.reason);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
