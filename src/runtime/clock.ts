// ── Clock ───────────────────────────────────────────────────────────────────

/** Time source for every wait in the pipeline. Tests substitute a fake. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class AbortError extends Error {
  override readonly name = "AbortError";

  constructor(message = "Operation aborted") {
    super(message);
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortError());
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new AbortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

// ── Bounded signals ─────────────────────────────────────────────────────────

export interface BoundedSignal {
  readonly signal: AbortSignal;
  readonly timedOut: () => boolean;
  dispose(): void;
}

/**
 * A signal that fires when `parent` aborts or `timeoutMs` passes, whichever
 * comes first. Call `dispose()` once the guarded work settles.
 */
export function boundedSignal(timeoutMs: number, parent?: AbortSignal): BoundedSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new AbortError(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
