import type { PipelineConfig } from "../config.ts";
import type { HealthCheck } from "../health/checks.ts";
import type { HealthProber } from "../health/health-prober.ts";
import type { Logger } from "../observability/logger.ts";
import type { ValidationTarget } from "../types/pipeline.ts";
import type { TargetResult, ValidationResult } from "./types.ts";

export interface ValidationGateDeps {
  readonly prober: HealthProber;
  readonly checkFor: (target: ValidationTarget) => HealthCheck;
  readonly logger: Logger;
}

/**
 * Final readiness verdict over the deployed stack. Every target is checked
 * exactly once, concurrently, and every failure is reported; the gate does
 * not stop at the first one.
 */
export class ValidationGate {
  constructor(private readonly deps: ValidationGateDeps) {}

  async validate(
    targets: readonly ValidationTarget[],
    config: PipelineConfig,
    signal?: AbortSignal,
  ): Promise<ValidationResult> {
    const startedAt = Date.now();
    const { validationTimeoutMs, pollIntervalMs } = config.timing;

    this.deps.logger.info("Validating deployment", {
      event: "step",
      targets: targets.map((t) => t.name),
    });

    const results = await Promise.all(
      targets.map(async (target): Promise<TargetResult> => {
        const health = await this.deps.prober.probe(this.deps.checkFor(target), {
          timeoutMs: validationTimeoutMs,
          intervalMs: pollIntervalMs,
          maxAttempts: 1,
          attemptTimeoutMs: validationTimeoutMs,
          signal,
        });
        return {
          name: target.name,
          status: health.status === "healthy" ? "passed" : "failed",
          message: health.message,
          durationMs: health.elapsedMs,
        };
      }),
    );

    const failedTargets = results.filter((r) => r.status === "failed").map((r) => r.name);
    const result: ValidationResult = {
      status: failedTargets.length === 0 ? "passed" : "failed",
      targets: results,
      failedTargets,
      durationMs: Date.now() - startedAt,
    };

    if (result.status === "passed") {
      this.deps.logger.info("All validation targets are healthy", { event: "success" });
    } else {
      this.deps.logger.error(`Validation failed for: ${failedTargets.join(", ")}`, {
        failedTargets,
      });
    }
    return result;
  }
}
