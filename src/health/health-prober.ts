import type { Logger } from "../observability/logger.ts";
import { boundedSignal, type Clock } from "../runtime/clock.ts";
import type { HealthCheckAttempt, HealthCheckResult } from "../types/health.ts";
import type { HealthCheck } from "./checks.ts";

// ── Config ────────────────────────────────────────────────────────────────────

export interface HealthProberConfig {
  /** A "still waiting" line is logged each time the wait crosses a multiple of this. */
  readonly progressIntervalMs: number;
}

export const DEFAULT_HEALTH_PROBER_CONFIG: HealthProberConfig = {
  progressIntervalMs: 30_000,
};

export interface ProbeOptions {
  readonly timeoutMs: number;
  readonly intervalMs: number;
  readonly maxAttempts?: number;
  /** Bound on a single attempt. Defaults to min(interval, 10 s), at least 1 s. */
  readonly attemptTimeoutMs?: number;
  readonly signal?: AbortSignal;
}

export const PROBE_CANCELLED_MESSAGE = "Probe cancelled";

/** Resolves with `null` once the signal aborts, whether or not the check listens to it. */
function abandoned(signal: AbortSignal): Promise<null> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve(null);
    else signal.addEventListener("abort", () => resolve(null), { once: true });
  });
}

function defaultAttemptTimeout(intervalMs: number): number {
  return Math.max(1_000, Math.min(intervalMs, 10_000));
}

// ── HealthProber ──────────────────────────────────────────────────────────────

/**
 * Polls one readiness signal until it reports healthy or the window closes.
 * Never throws; a cancelled wait resolves as `unknown`.
 */
export class HealthProber {
  private readonly config: HealthProberConfig;

  constructor(
    private readonly clock: Clock,
    private readonly logger: Logger,
    config?: Partial<HealthProberConfig>,
  ) {
    this.config = { ...DEFAULT_HEALTH_PROBER_CONFIG, ...config };
  }

  async probe(check: HealthCheck, options: ProbeOptions): Promise<HealthCheckResult> {
    const { timeoutMs, intervalMs, signal } = options;
    const maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY;
    const attemptTimeoutMs = options.attemptTimeoutMs ?? defaultAttemptTimeout(intervalMs);
    const startedAt = this.clock.now();
    const elapsed = (): number => this.clock.now() - startedAt;

    let attempts = 0;
    let lastMessage = "no attempt completed";
    let nextProgressAt = this.config.progressIntervalMs;

    const result = (status: HealthCheckResult["status"], message: string): HealthCheckResult => ({
      target: check.target,
      status,
      attempts,
      elapsedMs: elapsed(),
      message,
    });

    this.logger.debug(`Waiting for ${check.target} to be healthy`, {
      target: check.target,
      timeoutMs,
      intervalMs,
    });

    while (true) {
      if (signal?.aborted) return result("unknown", PROBE_CANCELLED_MESSAGE);

      attempts++;
      const attempt = await this.attempt(check, attemptTimeoutMs, signal);
      if (signal?.aborted) return result("unknown", PROBE_CANCELLED_MESSAGE);

      if (attempt.status === "healthy") {
        this.logger.info(`${check.target} is healthy`, {
          event: "success",
          target: check.target,
          attempts,
          elapsedMs: elapsed(),
        });
        return result("healthy", attempt.message);
      }

      lastMessage = attempt.message;
      this.logger.debug("Health check attempt did not pass", {
        target: check.target,
        attempt: attempts,
        status: attempt.status,
        message: attempt.message,
      });

      if (attempts >= maxAttempts) break;

      try {
        await this.clock.sleep(intervalMs, signal);
      } catch {
        return result("unknown", PROBE_CANCELLED_MESSAGE);
      }

      const waited = elapsed();
      if (waited >= timeoutMs) break;
      if (waited >= nextProgressAt) {
        this.logger.info(
          `Still waiting for ${check.target}... (${Math.floor(waited / 1000)}s elapsed)`,
          { target: check.target, attempts },
        );
        while (nextProgressAt <= waited) nextProgressAt += this.config.progressIntervalMs;
      }
    }

    this.logger.error(
      `${check.target} failed to become healthy within ${Math.round(timeoutMs / 1000)}s`,
      { target: check.target, attempts, lastMessage },
    );
    return result("unhealthy", lastMessage);
  }

  private async attempt(
    check: HealthCheck,
    attemptTimeoutMs: number,
    signal?: AbortSignal,
  ): Promise<HealthCheckAttempt> {
    const bounded = boundedSignal(attemptTimeoutMs, signal);
    try {
      const attempt = await Promise.race([check.check(bounded.signal), abandoned(bounded.signal)]);
      if (bounded.timedOut() && attempt?.status !== "healthy") {
        return { status: "unknown", message: `check timed out after ${attemptTimeoutMs}ms` };
      }
      return attempt ?? { status: "unknown", message: PROBE_CANCELLED_MESSAGE };
    } catch (err) {
      return {
        status: "unknown",
        message: err instanceof Error ? err.message : String(err),
      };
    } finally {
      bounded.dispose();
    }
  }
}
