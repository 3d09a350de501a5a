import type { PipelineConfig } from "../config.ts";
import type { HealthCheck } from "../health/checks.ts";
import type { HealthProber } from "../health/health-prober.ts";
import type { Logger } from "../observability/logger.ts";
import type { Stage, Step } from "../types/pipeline.ts";
import { runStepGraph, type GraphTask } from "./concurrency.ts";
import type { ServiceLauncher } from "./service-launcher.ts";
import type { StageResult, StepResult } from "./types.ts";

// ── Stage Runner Deps ───────────────────────────────────────────────────────

export interface StageRunnerDeps {
  readonly launcher: ServiceLauncher;
  readonly prober: HealthProber;
  /** Builds the readiness check for a step. */
  readonly checkFor: (step: Step) => HealthCheck;
  readonly logger: Logger;
}

const SKIPPED_AFTER_FAILURE = "stage aborted after an earlier failure";
const SKIPPED_DEPENDENCY = "a dependency did not become healthy";
const SKIPPED_CANCELLED = "run cancelled";
const INTERRUPTED = "interrupted before it became healthy";

// ── Stage Runner ────────────────────────────────────────────────────────────

/**
 * Brings every step of a stage to healthy: launch, then probe.
 *
 * A stage passes only when every non-best-effort step is healthy. The first
 * non-best-effort failure stops the stage; best-effort failures are
 * recorded and ignored. Results follow declared step order.
 */
export class StageRunner {
  constructor(private readonly deps: StageRunnerDeps) {}

  async run(stage: Stage, config: PipelineConfig, signal?: AbortSignal): Promise<StageResult> {
    const startedAt = Date.now();
    const logger = this.deps.logger.child({ stage: stage.name });
    const parallel = config.features.parallelExecution;

    logger.info(`Deploying stage ${stage.name}`, {
      event: "step",
      steps: stage.steps.length,
      mode: parallel ? "parallel" : "sequential",
    });

    const steps = parallel
      ? await this.runParallel(stage, config, logger, signal)
      : await this.runSequential(stage, config, logger, signal);

    // Prefer a step that failed on its own over one skipped because of it.
    const blocking =
      steps.find((s) => !s.bestEffort && s.status === "failed") ??
      steps.find((s) => !s.bestEffort && s.status !== "healthy");
    const result: StageResult = {
      stage: stage.name,
      status: blocking === undefined ? "passed" : "failed",
      steps,
      durationMs: Date.now() - startedAt,
      ...(blocking !== undefined ? { failedService: blocking.service } : {}),
    };

    if (result.status === "passed") {
      logger.info(`Stage ${stage.name} completed`, { event: "success", durationMs: result.durationMs });
    } else {
      logger.error(`Stage ${stage.name} failed`, {
        failedService: result.failedService,
        reason: blocking?.reason,
      });
    }
    return result;
  }

  // ── Modes ─────────────────────────────────────────────────────────────

  private async runSequential(
    stage: Stage,
    config: PipelineConfig,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<StepResult[]> {
    const results: StepResult[] = [];
    let stopReason: string | null = null;

    for (const step of stage.steps) {
      if (stopReason === null && signal?.aborted) stopReason = SKIPPED_CANCELLED;
      if (stopReason !== null) {
        results.push(skipped(step, stopReason));
        continue;
      }

      const result = await this.runStep(step, config, logger, signal);
      results.push(result);
      if (result.status === "failed" && !step.bestEffort) {
        stopReason = SKIPPED_AFTER_FAILURE;
      }
    }
    return results;
  }

  private async runParallel(
    stage: Stage,
    config: PipelineConfig,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<StepResult[]> {
    const indexOf = new Map(stage.steps.map((step, i) => [step.service, i] as const));

    const tasks: GraphTask<StepResult>[] = stage.steps.map((step) => ({
      // Dependencies from earlier stages are already healthy.
      dependsOn: step.dependsOn.flatMap((dep) => {
        const index = indexOf.get(dep);
        return index === undefined ? [] : [index];
      }),
      run: (stepSignal) => this.runStep(step, config, logger, stepSignal),
    }));

    const graph = await runStepGraph({
      tasks,
      maxConcurrency: config.maxParallelSteps,
      signal,
      isFailed: (r) => r.status === "failed" && !r.bestEffort,
      isSatisfied: (r) => r.status === "healthy",
    });

    return stage.steps.map((step, i) => {
      const result = graph.results[i];
      if (result !== undefined) return result;
      if (graph.blocked.includes(i)) return skipped(step, SKIPPED_DEPENDENCY);
      if (graph.aborted) return skipped(step, SKIPPED_CANCELLED);
      if (graph.firstFailureIndex !== null) return skipped(step, SKIPPED_AFTER_FAILURE);
      return skipped(step, SKIPPED_DEPENDENCY);
    });
  }

  // ── One step ──────────────────────────────────────────────────────────

  private async runStep(
    step: Step,
    config: PipelineConfig,
    stageLogger: Logger,
    signal?: AbortSignal,
  ): Promise<StepResult> {
    const startedAt = Date.now();
    const logger = stageLogger.child({ service: step.service });

    const launch = await this.deps.launcher.launch(step, signal);
    if (launch.status === "failed" && signal?.aborted) {
      return { ...skipped(step, INTERRUPTED), launch, durationMs: Date.now() - startedAt };
    }
    if (launch.status === "failed") {
      const result: StepResult = {
        service: step.service,
        status: "failed",
        bestEffort: step.bestEffort,
        launch,
        durationMs: Date.now() - startedAt,
        reason: launch.error ?? "launch failed",
      };
      this.reportFailure(step, result, logger);
      return result;
    }

    const health = await this.deps.prober.probe(this.deps.checkFor(step), {
      timeoutMs: config.timing.healthTimeoutMs,
      intervalMs: config.timing.pollIntervalMs,
      signal,
    });

    const healthy = health.status === "healthy";
    if (!healthy && signal?.aborted) {
      return { ...skipped(step, INTERRUPTED), launch, health, durationMs: Date.now() - startedAt };
    }
    const result: StepResult = {
      service: step.service,
      status: healthy ? "healthy" : "failed",
      bestEffort: step.bestEffort,
      launch,
      health,
      durationMs: Date.now() - startedAt,
      ...(healthy ? {} : { reason: `${step.service} did not become healthy: ${health.message}` }),
    };
    if (!healthy) this.reportFailure(step, result, logger);
    return result;
  }

  private reportFailure(step: Step, result: StepResult, logger: Logger): void {
    if (step.bestEffort) {
      logger.warn(`Best-effort service ${step.service} failed; continuing`, {
        reason: result.reason,
      });
    } else {
      logger.error(`Service ${step.service} failed`, { reason: result.reason });
    }
  }
}

function skipped(step: Step, reason: string): StepResult {
  return {
    service: step.service,
    status: "skipped",
    bestEffort: step.bestEffort,
    durationMs: 0,
    reason,
  };
}
