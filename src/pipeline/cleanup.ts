import type { Logger } from "../observability/logger.ts";
import {
  commandSucceeded,
  describeFailure,
  type CommandOutcome,
  type StackOperations,
} from "../orchestration/types.ts";
import { boundedSignal } from "../runtime/clock.ts";
import type { CleanupPhase, CleanupResult } from "./types.ts";

export interface CleanupOptions {
  readonly phase: CleanupPhase;
  /** Also remove images and volumes. */
  readonly forceRebuild: boolean;
  readonly timeoutMs: number;
}

/**
 * Best-effort teardown of the previous deployment. Every failure becomes a
 * warning; `run` never rejects and may be called any number of times.
 *
 * Runs under its own time bound, never under the run's cancel signal.
 */
export class Cleanup {
  constructor(
    private readonly stack: Pick<StackOperations, "teardown">,
    private readonly logger: Logger,
  ) {}

  async run(options: CleanupOptions): Promise<CleanupResult> {
    const startedAt = Date.now();
    const logger = this.logger.child({ phase: options.phase });
    const bound = boundedSignal(options.timeoutMs);
    const warnings: string[] = [];
    let outcomes: readonly CommandOutcome[] = [];

    logger.info("Cleaning up previous deployment...", {
      event: "step",
      removeImages: options.forceRebuild,
    });

    // Never rejects.
    const teardown = this.stack
      .teardown({ removeImages: options.forceRebuild, signal: bound.signal })
      .then(
        (done): TeardownSettled => ({ outcomes: done }),
        (err: unknown): TeardownSettled => ({ error: err instanceof Error ? err.message : String(err) }),
      );
    const settled = await Promise.race([teardown, whenAborted(bound.signal)]);
    bound.dispose();

    if (settled !== null && "outcomes" in settled) outcomes = settled.outcomes;
    if (settled !== null && "error" in settled) warnings.push(`cleanup failed: ${settled.error}`);

    for (const outcome of outcomes) {
      if (!commandSucceeded(outcome)) {
        warnings.push(`${outcome.command}: ${describeFailure(outcome)}`);
      }
    }
    const timedOut = bound.timedOut();
    if (timedOut) {
      warnings.push(`cleanup did not finish within ${options.timeoutMs / 1000}s`);
    }

    for (const warning of warnings) logger.warn(warning);
    if (warnings.length === 0) logger.info("Cleanup completed", { event: "success" });

    return {
      phase: options.phase,
      commands: outcomes.length,
      warnings,
      timedOut,
      durationMs: Date.now() - startedAt,
    };
  }
}

type TeardownSettled = { outcomes: readonly CommandOutcome[] } | { error: string };

function whenAborted(signal: AbortSignal): Promise<null> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(null);
      return;
    }
    signal.addEventListener("abort", () => resolve(null), { once: true });
  });
}
