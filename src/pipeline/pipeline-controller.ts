import type { PipelineConfig } from "../config.ts";
import { createHealthCheck, type FetchFn, type HealthCheckDeps } from "../health/checks.ts";
import { HealthProber } from "../health/health-prober.ts";
import type { Logger } from "../observability/logger.ts";
import type {
  BuildTool,
  CommandRunner,
  FixtureLoader,
  StackOperations,
} from "../orchestration/types.ts";
import type { Clock } from "../runtime/clock.ts";
import {
  APPLICATION_STAGE,
  INFRASTRUCTURE_STAGE,
  RUN_SEQUENCE,
  type PipelineDefinition,
  type PipelineState,
  type RunState,
} from "../types/pipeline.ts";
import { Cleanup } from "./cleanup.ts";
import { buildServiceCatalog, findStage } from "./definition.ts";
import { setupEnvironment, type EnvironmentContext, type EnvironmentSetup } from "./environment.ts";
import type { PrerequisiteChecker } from "./prerequisites.ts";
import { RunReportBuilder } from "./run-report.ts";
import { ServiceLauncher } from "./service-launcher.ts";
import { StageRunner } from "./stage-runner.ts";
import { PipelineStateMachine } from "./state-machine.ts";
import { TestStage } from "./test-stage.ts";
import type { TestSuite } from "./test-suites.ts";
import { PipelineError, type PipelineRunResult, type TestSuiteName } from "./types.ts";
import { ValidationGate } from "./validation-gate.ts";

// ── Collaborators ───────────────────────────────────────────────────────────

/** Everything bound to one environment; created once env-setup has run. */
export interface EnvironmentCollaborators {
  readonly stack: StackOperations;
  readonly build: BuildTool;
  readonly fixtures: FixtureLoader;
  readonly suites: Readonly<Record<TestSuiteName, TestSuite>>;
}

export type CollaboratorFactory = (environment: EnvironmentContext) => EnvironmentCollaborators;

export interface PipelineControllerDeps {
  readonly config: PipelineConfig;
  readonly definition: PipelineDefinition;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly prerequisites: PrerequisiteChecker;
  /** Runs host-side `command` health checks. */
  readonly commands: CommandRunner;
  readonly fetch: FetchFn;
  readonly createCollaborators: CollaboratorFactory;
  readonly setupEnvironment?: EnvironmentSetup;
  readonly runId: string;
  readonly logFile: string | null;
  readonly now?: () => Date;
}

const STATE_TITLES: Record<RunState, string> = {
  "prereq-check": "Checking prerequisites",
  "env-setup": "Setting up environment",
  cleanup: "Cleaning up previous deployment",
  build: "Building application and images",
  "fixture-load": "Staging test fixtures",
  "infra-stage": "Deploying infrastructure services",
  "app-stage": "Deploying application services",
  "test-stage": "Running test suites",
  "validation-gate": "Validating deployment",
  summary: "Deployment summary",
};

/** Mutable state of one run. */
interface ActiveRun {
  readonly report: RunReportBuilder;
  readonly signal?: AbortSignal;
  collaborators: EnvironmentCollaborators | null;
  launcher: ServiceLauncher | null;
}

// ── Pipeline Controller ─────────────────────────────────────────────────────

/**
 * Drives one deployment through the fixed state sequence.
 *
 * prereq-check, env-setup, build and both deploy stages are fatal: a failure
 * there ends the run in `failed` and, once the environment exists, rolls
 * back with a best-effort cleanup. Test and validation failures are recorded
 * and the run continues to the summary. Never throws.
 */
export class PipelineController {
  private readonly logger: Logger;
  private readonly prober: HealthProber;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineControllerDeps) {
    this.logger = deps.logger.child({ runId: deps.runId });
    this.prober = new HealthProber(deps.clock, this.component("health-prober"), {
      progressIntervalMs: deps.config.timing.progressIntervalMs,
    });
    this.now = deps.now ?? (() => new Date());
  }

  async run(signal?: AbortSignal): Promise<PipelineRunResult> {
    const { config } = this.deps;
    const report = new RunReportBuilder({
      runId: this.deps.runId,
      environment: config.environment,
      startedAt: this.now(),
      logFile: this.deps.logFile,
    });
    const machine = new PipelineStateMachine((transition) => {
      report.recordTransition(transition);
      this.logger.debug(`Pipeline state: ${transition.from} -> ${transition.to}`);
    }, this.now);
    const active: ActiveRun = { report, signal, collaborators: null, launcher: null };

    this.logger.info(`Starting deployment ${this.deps.runId} to ${config.environment}`, {
      event: "step",
      parallel: config.features.parallelExecution,
      forceRebuild: config.features.forceRebuild,
    });

    let error: PipelineError | undefined;
    try {
      for (const state of RUN_SEQUENCE) {
        this.throwIfAborted(signal, machine.current);
        machine.transition(state);
        this.logger.info(STATE_TITLES[state], { event: "step", state });
        await this.enter(state, active);
      }
      this.throwIfAborted(signal, machine.current);
      machine.transition(report.failureCount === 0 ? "succeeded" : "failed");
    } catch (err) {
      error = toPipelineError(err, machine.current);
      this.logger.error(error.message, { code: error.code, state: error.state });
      report.fail(error.message);
      await this.rollback(active);
      if (!machine.isTerminal()) machine.transition("failed");
    }

    const final = report.finalize(machine.current, this.now());
    const exitCode = final.status === "succeeded" ? 0 : 1;
    if (exitCode === 0) {
      this.logger.info("Deployment completed successfully", { event: "success" });
    } else {
      this.logger.error("Deployment failed", { failures: final.failures });
    }
    return error !== undefined ? { report: final, exitCode, error } : { report: final, exitCode };
  }

  private component(name: string): Logger {
    return this.logger.child({ component: name });
  }

  // ── States ────────────────────────────────────────────────────────────

  private async enter(state: RunState, run: ActiveRun): Promise<void> {
    switch (state) {
      case "prereq-check":
        return this.checkPrerequisites(run);
      case "env-setup":
        return this.setupEnvironment(run);
      case "cleanup":
        return this.cleanup(run);
      case "build":
        return this.build(run);
      case "fixture-load":
        return this.loadFixtures(run);
      case "infra-stage":
        return this.deployStage(INFRASTRUCTURE_STAGE, state, run);
      case "app-stage":
        return this.deployStage(APPLICATION_STAGE, state, run);
      case "test-stage":
        return this.runTests(run);
      case "validation-gate":
        return this.validate(run);
      case "summary":
        return this.summarize();
    }
  }

  private async checkPrerequisites(run: ActiveRun): Promise<void> {
    const result = await this.deps.prerequisites.check(
      this.deps.definition.prerequisites.tools,
      run.signal,
    );
    if (!result.passed) {
      throw new PipelineError(
        `Prerequisites not met: ${result.failures.join("; ")}`,
        "PREREQUISITE_FAILED",
        "prereq-check",
      );
    }
  }

  private async setupEnvironment(run: ActiveRun): Promise<void> {
    const setup = this.deps.setupEnvironment ?? setupEnvironment;
    let context: EnvironmentContext;
    try {
      context = await setup(
        this.deps.config,
        this.deps.definition,
        this.component("environment"),
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PipelineError(
        `Environment setup failed: ${message}`,
        "ENV_SETUP_FAILED",
        "env-setup",
        err instanceof Error ? err : undefined,
      );
    }

    const collaborators = this.deps.createCollaborators(context);
    run.collaborators = collaborators;
    run.launcher = new ServiceLauncher(
      collaborators.stack,
      buildServiceCatalog(this.deps.definition),
      this.component("service-launcher"),
    );
  }

  private async cleanup(run: ActiveRun): Promise<void> {
    const { stack } = this.requireCollaborators(run, "cleanup");
    const result = await new Cleanup(stack, this.component("cleanup")).run({
      phase: "pre-deploy",
      forceRebuild: this.deps.config.features.forceRebuild,
      timeoutMs: this.deps.config.timing.cleanupTimeoutMs,
    });
    run.report.addCleanup(result);
  }

  private async build(run: ActiveRun): Promise<void> {
    const { build } = this.requireCollaborators(run, "build");
    const { features } = this.deps.config;
    const result = await build.build({
      forceRebuild: features.forceRebuild,
      parallel: features.parallelExecution,
      signal: run.signal,
    });
    if (result.status === "failed") {
      throw new PipelineError(
        `Build failed: ${result.error ?? "unknown error"}`,
        "BUILD_FAILED",
        "build",
      );
    }
  }

  private async loadFixtures(run: ActiveRun): Promise<void> {
    const { fixtures } = this.requireCollaborators(run, "fixture-load");
    const result = await fixtures.load(this.deps.definition.fixtures);
    for (const failure of result.failed) {
      run.report.warn(`Could not stage fixture ${failure.name}: ${failure.error}`);
    }
    run.report.setFixtures({
      loaded: result.loaded,
      failed: result.failed.map((f) => f.name),
    });
  }

  private async deployStage(name: string, state: RunState, run: ActiveRun): Promise<void> {
    const { stack } = this.requireCollaborators(run, state);
    const stage = findStage(this.deps.definition, name);
    if (stage === undefined || run.launcher === null) {
      throw new PipelineError(`Stage "${name}" is not defined`, "INVALID_DEFINITION", state);
    }

    const checkDeps = this.healthCheckDeps(stack);
    const runner = new StageRunner({
      launcher: run.launcher,
      prober: this.prober,
      checkFor: (step) => createHealthCheck(step.service, step.healthCheck, checkDeps),
      logger: this.component("stage-runner"),
    });

    const result = await runner.run(stage, this.deps.config, run.signal);
    run.report.addStage(result);
    for (const step of result.steps) {
      if (step.bestEffort && step.status === "failed") {
        run.report.warn(`Best-effort service ${step.service} failed: ${step.reason ?? "unknown"}`);
      }
    }

    this.throwIfAborted(run.signal, state);
    if (result.status === "failed") {
      const failed = result.steps.find((s) => s.service === result.failedService);
      throw new PipelineError(
        `Stage ${name} failed at ${result.failedService ?? "unknown service"}: ${failed?.reason ?? "unknown"}`,
        "STAGE_FAILED",
        state,
      );
    }
  }

  private async runTests(run: ActiveRun): Promise<void> {
    const { suites } = this.requireCollaborators(run, "test-stage");
    const tests = new TestStage(suites, this.component("test-stage"));
    const result = await tests.run(this.deps.config, run.signal);
    run.report.setTests(result.runs);
    this.throwIfAborted(run.signal, "test-stage");

    if (result.status === "failed") {
      const failed = result.runs.filter((r) => r.status === "failed").map((r) => r.suite);
      run.report.fail(`Tests failed: ${failed.join(", ")}`);
    }
  }

  private async validate(run: ActiveRun): Promise<void> {
    const { stack } = this.requireCollaborators(run, "validation-gate");
    const checkDeps = this.healthCheckDeps(stack);
    const gate = new ValidationGate({
      prober: this.prober,
      checkFor: (target) => createHealthCheck(target.name, target.check, checkDeps),
      logger: this.component("validation-gate"),
    });

    const result = await gate.validate(this.deps.definition.validation, this.deps.config, run.signal);
    run.report.setValidation(result);
    this.throwIfAborted(run.signal, "validation-gate");

    if (result.status === "failed") {
      run.report.fail(`Validation failed for: ${result.failedTargets.join(", ")}`);
    }
  }

  private async summarize(): Promise<void> {
    const { endpoints } = this.deps.definition;
    if (endpoints.length > 0) {
      this.logger.info("Service endpoints:");
      for (const endpoint of endpoints) {
        this.logger.info(`  ${endpoint.label}: ${endpoint.url}`);
      }
    }
    if (this.deps.logFile !== null) {
      this.logger.info(`Deployment log: ${this.deps.logFile}`);
    }
  }

  // ── Failure handling ──────────────────────────────────────────────────

  private async rollback(run: ActiveRun): Promise<void> {
    if (run.collaborators === null) return;
    if (!this.deps.config.features.cleanupOnFailure) {
      this.logger.warn("Leaving the failed deployment running for inspection");
      return;
    }
    this.logger.warn("Rolling back the failed deployment");
    const result = await new Cleanup(run.collaborators.stack, this.component("cleanup")).run({
      phase: "rollback",
      forceRebuild: false,
      timeoutMs: this.deps.config.timing.cleanupTimeoutMs,
    });
    run.report.addCleanup(result);
  }

  // ── Helpers ───────────────────────────────────────────────────────────

  private requireCollaborators(run: ActiveRun, state: RunState): EnvironmentCollaborators {
    if (run.collaborators === null) {
      throw new PipelineError(`No environment prepared before ${state}`, "UNKNOWN", state);
    }
    return run.collaborators;
  }

  private healthCheckDeps(stack: StackOperations): HealthCheckDeps {
    return {
      runtime: stack,
      executor: stack,
      commands: this.deps.commands,
      fetch: this.deps.fetch,
      cwd: this.deps.config.projectRoot,
    };
  }

  private throwIfAborted(signal: AbortSignal | undefined, state: PipelineState): void {
    if (signal?.aborted) {
      throw new PipelineError("Deployment interrupted", "ABORTED", state);
    }
  }
}

function toPipelineError(err: unknown, state: PipelineError["state"]): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PipelineError(
    `Unexpected error: ${message}`,
    "UNKNOWN",
    state,
    err instanceof Error ? err : undefined,
  );
}
