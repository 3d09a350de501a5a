// ── Dependency-Aware Concurrent Execution with Fail-Fast ────────────────────

/** One node of the graph. `dependsOn` holds indices of earlier tasks. */
export interface GraphTask<T> {
  readonly dependsOn: readonly number[];
  readonly run: (signal: AbortSignal) => Promise<T>;
}

/**
 * Options for `runStepGraph()`.
 *
 * Each task function receives an `AbortSignal` that fires on either:
 *   1. Parent signal abort (caller cancellation)
 *   2. Fail-fast abort (another task returned a fatal result)
 */
export interface StepGraphOptions<T> {
  readonly tasks: readonly GraphTask<T>[];
  /** Maximum number of tasks running simultaneously. Must be >= 1. */
  readonly maxConcurrency: number;
  readonly signal?: AbortSignal;
  /** True when a result must stop the whole graph. */
  readonly isFailed: (result: T) => boolean;
  /** True when dependents of this result may start. */
  readonly isSatisfied: (result: T) => boolean;
}

export interface StepGraphResult<T> {
  /** Input order; `undefined` for tasks that never ran. */
  readonly results: readonly (T | undefined)[];
  /** Tasks not run because a dependency was not satisfied. */
  readonly blocked: readonly number[];
  /** Index of the first fatal result, or of a task that threw. */
  readonly firstFailureIndex: number | null;
  /** True if the parent signal (not fail-fast) caused the abort. */
  readonly aborted: boolean;
}

type Slot = "pending" | "running" | "done" | "blocked";

/**
 * Execute a dependency graph of async tasks with bounded concurrency.
 *
 * - A task starts once every dependency finished and satisfied `isSatisfied`
 * - A task whose dependency is unsatisfied or blocked is itself blocked
 * - On the first `isFailed` result: aborts in-flight tasks through a child
 *   `AbortController` and starts nothing new
 * - Resolves only after every started task settles; never throws
 */
export async function runStepGraph<T>(
  options: StepGraphOptions<T>,
): Promise<StepGraphResult<T>> {
  const { tasks, maxConcurrency, signal, isFailed, isSatisfied } = options;

  if (tasks.length === 0) {
    return { results: [], blocked: [], firstFailureIndex: null, aborted: false };
  }

  if (signal?.aborted) {
    return {
      results: tasks.map(() => undefined),
      blocked: [],
      firstFailureIndex: null,
      aborted: true,
    };
  }

  const effectiveConcurrency = Math.max(1, maxConcurrency);

  // ── Child abort controller ───────────────────────────────────────────
  const childController = new AbortController();
  const childSignal = childController.signal;
  let parentAborted = false;
  const onParentAbort = (): void => {
    parentAborted = true;
    childController.abort();
  };
  signal?.addEventListener("abort", onParentAbort, { once: true });

  // ── State ────────────────────────────────────────────────────────────
  const slots: Slot[] = tasks.map(() => "pending");
  const results: (T | undefined)[] = tasks.map(() => undefined);
  let running = 0;
  let firstFailureIndex: number | null = null;
  let settled = false;

  const satisfied = (index: number): boolean => {
    const result = results[index];
    return slots[index] === "done" && result !== undefined && isSatisfied(result);
  };

  return new Promise<StepGraphResult<T>>((resolve) => {
    const tryResolve = (): void => {
      if (settled || running > 0) return;
      settled = true;
      signal?.removeEventListener("abort", onParentAbort);
      const blocked: number[] = [];
      slots.forEach((slot, index) => {
        if (slot === "blocked") blocked.push(index);
      });
      resolve({ results, blocked, firstFailureIndex, aborted: parentAborted });
    };

    const fail = (index: number): void => {
      if (firstFailureIndex === null) {
        firstFailureIndex = index;
        childController.abort();
      }
    };

    const launch = (index: number): void => {
      const task = tasks[index]!;
      slots[index] = "running";
      running++;

      task.run(childSignal).then(
        (result) => {
          running--;
          slots[index] = "done";
          results[index] = result;
          if (isFailed(result)) fail(index);
          pump();
        },
        (_error: unknown) => {
          // Tasks are expected to report failure as a result; a throw is fatal.
          running--;
          slots[index] = "done";
          fail(index);
          pump();
        },
      );
    };

    const pump = (): void => {
      let progressed = true;
      while (progressed) {
        progressed = false;
        for (let i = 0; i < tasks.length; i++) {
          if (slots[i] !== "pending") continue;
          const deps = tasks[i]!.dependsOn;

          const unsatisfied = deps.some(
            (d) => slots[d] === "blocked" || (slots[d] === "done" && !satisfied(d)),
          );
          if (unsatisfied) {
            slots[i] = "blocked";
            progressed = true;
            continue;
          }

          if (childSignal.aborted || running >= effectiveConcurrency) continue;
          if (deps.every((d) => slots[d] === "done")) {
            launch(i);
            progressed = true;
          }
        }
      }
      tryResolve();
    };

    pump();
  });
}
