import { describe, expect, it } from "vitest";
import type { PipelineConfig } from "../../config.ts";
import { BufferLogger } from "../../observability/logger.ts";
import {
  FakeClock,
  FakeStack,
  RecordingCommandRunner,
  StubBuild,
  StubFixtures,
  StubHost,
  stubSuites,
  testConfig,
  testDefinition,
} from "../../__tests__/helpers.ts";
import type { PipelineDefinition } from "../../types/pipeline.ts";
import type { EnvironmentContext, EnvironmentSetup } from "../environment.ts";
import { PipelineController } from "../pipeline-controller.ts";
import { PrerequisiteChecker } from "../prerequisites.ts";
import type { TestSuiteName } from "../types.ts";

// ── Harness ──────────────────────────────────────────────────────────────────

const context: EnvironmentContext = {
  projectName: "banking-local",
  composeFile: "/tmp/banking-under-test/docker-compose.yml",
  variables: {},
  directories: [],
};

interface HarnessOptions {
  config?: PipelineConfig;
  definition?: PipelineDefinition;
  host?: StubHost;
  failingSuites?: readonly TestSuiteName[];
  setup?: EnvironmentSetup;
}

function createHarness(options: HarnessOptions = {}) {
  const config = options.config ?? testConfig({ parallelExecution: false });
  const stack = new FakeStack();
  const build = new StubBuild();
  const fixtures = new StubFixtures();
  const suites = stubSuites(options.failingSuites);
  const logger = new BufferLogger();
  const commands = new RecordingCommandRunner();
  let factoryCalls = 0;

  const controller = new PipelineController({
    config,
    definition: options.definition ?? testDefinition(),
    logger,
    clock: new FakeClock(),
    prerequisites: new PrerequisiteChecker(
      options.host ?? new StubHost(),
      commands,
      { dockerBinary: "docker", projectRoot: config.projectRoot, minFreeDiskBytes: 1, daemonTimeoutMs: 1_000 },
      logger,
    ),
    commands,
    fetch: () => Promise.reject(new Error("no network in tests")),
    createCollaborators: () => {
      factoryCalls++;
      return { stack, build, fixtures, suites };
    },
    setupEnvironment: options.setup ?? (async () => context),
    runId: "deploy-local-20260301-a1b2c3",
    logFile: "/tmp/banking-under-test/logs/deployment_20260301_090000.log",
  });

  return { controller, stack, build, fixtures, suites, logger, factoryCalls: () => factoryCalls };
}

// ── Scenarios ────────────────────────────────────────────────────────────────

describe("PipelineController", () => {
  it("succeeds when every stage, suite and target is healthy", async () => {
    const { controller, stack, build } = createHarness();

    const { report, exitCode, error } = await controller.run();

    expect(exitCode).toBe(0);
    expect(error).toBeUndefined();
    expect(report.status).toBe("succeeded");
    expect(report.finalState).toBe("succeeded");
    expect(report.stateHistory.map((t) => t.to)).toEqual([
      "prereq-check",
      "env-setup",
      "cleanup",
      "build",
      "fixture-load",
      "infra-stage",
      "app-stage",
      "test-stage",
      "validation-gate",
      "summary",
      "succeeded",
    ]);
    expect(report.stages.map((s) => [s.stage, s.status])).toEqual([
      ["infrastructure", "passed"],
      ["application", "passed"],
    ]);
    expect(report.validation?.status).toBe("passed");
    expect(stack.launches).toEqual(["postgres", "redis", "zookeeper", "kafka", "banking-app"]);
    expect(stack.teardowns).toHaveLength(1);
    expect(build.calls).toEqual([{ forceRebuild: false, parallel: false, signal: undefined }]);
  });

  it("fails the infrastructure stage when postgres never becomes healthy", async () => {
    const { controller, stack } = createHarness();
    stack.healthScripts.set("postgres", "unhealthy");

    const { report, exitCode, error } = await controller.run();

    expect(exitCode).toBe(1);
    expect(error?.code).toBe("STAGE_FAILED");
    expect(error?.state).toBe("infra-stage");
    expect(report.finalState).toBe("failed");
    expect(report.stages).toHaveLength(1);
    expect(report.stages[0]?.failedService).toBe("postgres");
    expect(report.stages[0]?.steps[0]?.health?.attempts).toBe(5);
    expect(stack.launches).not.toContain("banking-app");
    expect(report.tests).toEqual([]);
    expect(report.validation).toBeNull();
    expect(report.cleanup.map((c) => c.phase)).toEqual(["pre-deploy", "rollback"]);
  });

  it("reports every failed validation target and exits 1", async () => {
    const definition = testDefinition({
      validation: [
        { name: "banking-app", check: { type: "service" } },
        { name: "redis", check: { type: "service" } },
        { name: "postgres", check: { type: "exec", service: "postgres", command: ["pg_isready"] } },
        { name: "kafka", check: { type: "exec", service: "kafka", command: ["kafka-topics", "--list"] } },
      ],
    });
    const { controller, stack } = createHarness({ definition });
    // Healthy while deploying, unhealthy by the time the gate looks.
    stack.healthScripts.set("redis", (call) => (call === 1 ? "healthy" : "unhealthy"));
    stack.execExitCodes.set("postgres", 1);

    const { report, exitCode, error } = await controller.run();

    expect(exitCode).toBe(1);
    expect(error).toBeUndefined();
    expect(report.finalState).toBe("failed");
    expect(report.validation?.failedTargets).toEqual(["redis", "postgres"]);
    expect(report.failures).toEqual(["Validation failed for: redis, postgres"]);
    expect(report.stateHistory.map((t) => t.to).slice(-2)).toEqual(["summary", "failed"]);
    // Reported failures leave the stack up.
    expect(report.cleanup.map((c) => c.phase)).toEqual(["pre-deploy"]);
  });

  it("runs the other suites when e2e is skipped", async () => {
    const { controller, suites } = createHarness({
      config: testConfig({ parallelExecution: false, skipE2eTests: true }),
    });

    const { report, exitCode } = await controller.run();

    expect(exitCode).toBe(0);
    expect(suites.e2e.calls).toBe(0);
    expect(suites.unit.calls).toBe(1);
    expect(suites.integration.calls).toBe(1);
    expect(report.tests.map((t) => [t.suite, t.status])).toEqual([
      ["unit", "passed"],
      ["integration", "passed"],
      ["e2e", "skipped"],
      ["api", "passed"],
    ]);
  });

  it("continues to validation after a failed test suite", async () => {
    const { controller } = createHarness({ failingSuites: ["integration"] });

    const { report, exitCode } = await controller.run();

    expect(exitCode).toBe(1);
    expect(report.failures).toEqual(["Tests failed: integration"]);
    expect(report.validation?.status).toBe("passed");
  });

  it("stops before touching the stack when prerequisites fail", async () => {
    const definition = testDefinition({ prerequisites: { tools: ["docker", "java"] } });
    const { controller, stack, factoryCalls } = createHarness({ definition, host: new StubHost(["docker"]) });

    const { report, error } = await controller.run();

    expect(error?.code).toBe("PREREQUISITE_FAILED");
    expect(error?.message).toBe("Prerequisites not met: java is not installed or not on PATH");
    expect(report.stateHistory.map((t) => t.to)).toEqual(["prereq-check", "failed"]);
    expect(stack.teardowns).toEqual([]);
    expect(factoryCalls()).toBe(0);
  });

  it("fails in env-setup without cleanup when setup rejects", async () => {
    const { controller, stack, factoryCalls } = createHarness({
      setup: () => Promise.reject(new Error("EACCES: permission denied, mkdir '/srv/logs'")),
    });

    const { error } = await controller.run();

    expect(error?.code).toBe("ENV_SETUP_FAILED");
    expect(error?.message).toBe("Environment setup failed: EACCES: permission denied, mkdir '/srv/logs'");
    expect(factoryCalls()).toBe(0);
    expect(stack.teardowns).toEqual([]);
  });

  it("rolls back after a build failure", async () => {
    const { controller, stack, build } = createHarness();
    build.error = "application build failed: exit code 1: compilation error";

    const { report, error } = await controller.run();

    expect(error?.code).toBe("BUILD_FAILED");
    expect(stack.launches).toEqual([]);
    expect(report.cleanup.map((c) => c.phase)).toEqual(["pre-deploy", "rollback"]);
  });

  it("keeps the failed deployment when cleanup on failure is off", async () => {
    const { controller, stack, logger } = createHarness({
      config: testConfig({ parallelExecution: false, cleanupOnFailure: false }),
    });
    stack.failLaunch.add("redis");

    const { report } = await controller.run();

    expect(report.cleanup.map((c) => c.phase)).toEqual(["pre-deploy"]);
    expect(logger.has("warn", "Leaving the failed deployment running for inspection")).toBe(true);
  });

  it("records fixture failures as warnings", async () => {
    const definition = testDefinition({
      fixtures: [
        { name: "seed-data", source: "/opt/fixtures/seed-data.sql", destination: "data/init-scripts/seed-data.sql" },
        { name: "realm", source: "/opt/fixtures/realm.json", destination: "config/keycloak/realms/realm.json" },
      ],
    });
    const { controller, fixtures } = createHarness({ definition });
    fixtures.failing.add("realm");

    const { report, exitCode } = await controller.run();

    expect(exitCode).toBe(0);
    expect(report.fixtures).toEqual({ loaded: ["seed-data"], failed: ["realm"] });
    expect(report.warnings).toEqual(["Could not stage fixture realm: EACCES: permission denied"]);
  });

  it("ignores a failed best-effort service", async () => {
    const definition = testDefinition();
    const withGrafana = testDefinition({
      stages: [
        definition.stages[0]!,
        {
          name: "application",
          steps: [
            ...definition.stages[1]!.steps,
            { service: "grafana", dependsOn: [], healthCheck: { type: "service" }, bestEffort: true },
          ],
        },
      ],
    });
    const { controller, stack } = createHarness({ definition: withGrafana });
    stack.failLaunch.add("grafana");

    const { report, exitCode } = await controller.run();

    expect(exitCode).toBe(0);
    expect(report.warnings).toEqual([
      "Best-effort service grafana failed: failed to start grafana: exit code 1: no such image: grafana",
    ]);
  });

  it("records an interrupted run as aborted and still cleans up", async () => {
    const { controller, stack } = createHarness();
    const interrupt = new AbortController();
    stack.launchHook = async (service) => {
      if (service === "redis") interrupt.abort();
    };

    const { report, error, exitCode } = await controller.run(interrupt.signal);

    expect(exitCode).toBe(1);
    expect(error?.code).toBe("ABORTED");
    expect(error?.state).toBe("infra-stage");
    expect(stack.launches).toEqual(["postgres", "redis"]);
    expect(report.cleanup.map((c) => c.phase)).toEqual(["pre-deploy", "rollback"]);
    expect(report.finalState).toBe("failed");
  });
});
