import type { Logger } from "../observability/logger.ts";
import { commandSucceeded, describeFailure, type ServiceRuntime } from "../orchestration/types.ts";
import type { Step } from "../types/pipeline.ts";
import type { LaunchResult } from "./types.ts";

/**
 * Starts services in dependency order. Each service is started at most once
 * per run; later requests for it reuse the first launch's outcome.
 * Launching never waits for readiness.
 */
export class ServiceLauncher {
  private readonly launches = new Map<string, Promise<string | null>>();

  constructor(
    private readonly runtime: ServiceRuntime,
    private readonly catalog: ReadonlyMap<string, readonly string[]>,
    private readonly logger: Logger,
  ) {}

  async launch(step: Step, signal?: AbortSignal): Promise<LaunchResult> {
    const startedAt = Date.now();
    const launched: string[] = [];
    const error = await this.ensure(step.service, step.dependsOn, launched, [], signal);

    return {
      service: step.service,
      status: error === null ? "launched" : "failed",
      launched,
      durationMs: Date.now() - startedAt,
      ...(error !== null ? { error } : {}),
    };
  }

  hasLaunched(service: string): boolean {
    return this.launches.has(service);
  }

  /** Depth-first: dependencies, then the service. Resolves to an error or null. */
  private async ensure(
    service: string,
    dependsOn: readonly string[],
    launched: string[],
    path: readonly string[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (path.includes(service)) {
      return `dependency cycle: ${[...path, service].join(" -> ")}`;
    }

    for (const dep of dependsOn) {
      const depError = await this.ensure(
        dep,
        this.catalog.get(dep) ?? [],
        launched,
        [...path, service],
        signal,
      );
      if (depError !== null) return depError;
    }

    const existing = this.launches.get(service);
    if (existing) return existing;

    const pending = this.start(service, launched, signal);
    this.launches.set(service, pending);
    return pending;
  }

  private async start(
    service: string,
    launched: string[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    this.logger.info(`Starting ${service}...`, { service });
    const outcome = await this.runtime.ensureRunning(service, signal);
    if (!commandSucceeded(outcome)) {
      const error = `failed to start ${service}: ${describeFailure(outcome)}`;
      this.logger.error(error, { service });
      return error;
    }
    launched.push(service);
    return null;
  }
}
