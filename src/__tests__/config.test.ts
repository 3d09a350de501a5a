import { describe, expect, it } from "vitest";
import { resolve } from "node:path";
import { loadConfig, ConfigError, DEFAULT_DEFINITION_PATH } from "../config.ts";

function catchConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected ConfigError");
}

describe("loadConfig", () => {
  // ── Defaults ───────────────────────────────────────────────────────────

  it("uses defaults when nothing is set", () => {
    const config = loadConfig({}, {});

    expect(config.environment).toBe("local");
    expect(config.projectRoot).toBe(process.cwd());
    expect(config.definitionPath).toBe(DEFAULT_DEFINITION_PATH);
    expect(config.features).toEqual({
      monitoring: true,
      directoryService: true,
      forceRebuild: false,
      parallelExecution: true,
      cleanupOnFailure: true,
    });
    expect(config.tests).toEqual({ unit: true, integration: true, e2e: true, api: true });
    expect(config.timing).toEqual({
      healthTimeoutMs: 300_000,
      pollIntervalMs: 5_000,
      progressIntervalMs: 30_000,
      validationTimeoutMs: 10_000,
      cleanupTimeoutMs: 120_000,
    });
    expect(config.resources.minFreeDiskBytes).toBe(10 * 1024 ** 3);
    expect(config.logging).toEqual({ level: "info", format: "pretty" });
    expect(config.maxParallelSteps).toBe(4);
    expect(config.dryRun).toBe(false);
  });

  it("default definition path points at the shipped pipeline.yaml", () => {
    expect(DEFAULT_DEFINITION_PATH.endsWith("config/pipeline.yaml")).toBe(true);
  });

  // ── Environment variables ──────────────────────────────────────────────

  it("reads environment variables", () => {
    const config = loadConfig(
      {},
      {
        ENVIRONMENT: "staging",
        ENABLE_MONITORING: "false",
        ENABLE_LDAP: "no",
        FORCE_REBUILD: "1",
        PARALLEL_EXECUTION: "FALSE",
        HEALTH_CHECK_TIMEOUT: "120",
        HEALTH_CHECK_INTERVAL: "2.5",
        VALIDATION_TIMEOUT: "3",
        CLEANUP_TIMEOUT: "30",
        MIN_FREE_DISK_GB: "2",
        MAX_PARALLEL_STEPS: "8",
        LOG_LEVEL: "debug",
        LOG_FORMAT: "json",
        PROJECT_ROOT: "/srv/banking",
        PIPELINE_DEFINITION: "/etc/deployer/pipeline.yaml",
      },
    );

    expect(config.environment).toBe("staging");
    expect(config.features.monitoring).toBe(false);
    expect(config.features.directoryService).toBe(false);
    expect(config.features.forceRebuild).toBe(true);
    expect(config.features.parallelExecution).toBe(false);
    expect(config.timing.healthTimeoutMs).toBe(120_000);
    expect(config.timing.pollIntervalMs).toBe(2_500);
    expect(config.timing.validationTimeoutMs).toBe(3_000);
    expect(config.timing.cleanupTimeoutMs).toBe(30_000);
    expect(config.resources.minFreeDiskBytes).toBe(2 * 1024 ** 3);
    expect(config.maxParallelSteps).toBe(8);
    expect(config.logging).toEqual({ level: "debug", format: "json" });
    expect(config.projectRoot).toBe("/srv/banking");
    expect(config.definitionPath).toBe("/etc/deployer/pipeline.yaml");
  });

  it("SKIP_TESTS disables every sub-run", () => {
    const config = loadConfig({}, { SKIP_TESTS: "true" });
    expect(config.tests).toEqual({ unit: false, integration: false, e2e: false, api: false });
  });

  it("individual skip variables disable only their sub-run", () => {
    const config = loadConfig({}, { SKIP_E2E_TESTS: "yes", SKIP_API_TESTS: "1" });
    expect(config.tests).toEqual({ unit: true, integration: true, e2e: false, api: false });
  });

  // ── Overrides win ──────────────────────────────────────────────────────

  it("command-line overrides win over environment variables", () => {
    const config = loadConfig(
      {
        environment: "test",
        monitoring: true,
        parallelExecution: true,
        healthTimeoutSeconds: 10,
        pollIntervalSeconds: 2,
        skipIntegrationTests: true,
        definitionPath: "custom.yaml",
        cleanupOnFailure: false,
        dryRun: true,
      },
      { ENVIRONMENT: "production", ENABLE_MONITORING: "false", PARALLEL_EXECUTION: "false" },
    );

    expect(config.environment).toBe("test");
    expect(config.features.monitoring).toBe(true);
    expect(config.features.parallelExecution).toBe(true);
    expect(config.features.cleanupOnFailure).toBe(false);
    expect(config.timing.healthTimeoutMs).toBe(10_000);
    expect(config.timing.pollIntervalMs).toBe(2_000);
    expect(config.tests.integration).toBe(false);
    expect(config.tests.unit).toBe(true);
    expect(config.definitionPath).toBe(resolve(process.cwd(), "custom.yaml"));
    expect(config.dryRun).toBe(true);
  });

  it("skipTests override disables everything even when env enables sub-runs", () => {
    const config = loadConfig({ skipTests: true }, { SKIP_UNIT_TESTS: "false" });
    expect(config.tests.unit).toBe(false);
    expect(config.tests.api).toBe(false);
  });

  // ── Validation ─────────────────────────────────────────────────────────

  it("rejects an unknown environment", () => {
    const err = catchConfigError(() => loadConfig({}, { ENVIRONMENT: "qa" }));
    expect(err.field).toBe("ENVIRONMENT");
    expect(err.message).toContain("local, test, staging, production");
  });

  it("names the flag when the environment override is invalid", () => {
    const err = catchConfigError(() => loadConfig({ environment: "dev" }, {}));
    expect(err.field).toBe("environment");
  });

  it("rejects a malformed boolean", () => {
    const err = catchConfigError(() => loadConfig({}, { FORCE_REBUILD: "maybe" }));
    expect(err.field).toBe("FORCE_REBUILD");
  });

  it("rejects non-positive and non-numeric timings", () => {
    expect(catchConfigError(() => loadConfig({}, { HEALTH_CHECK_TIMEOUT: "0" })).field).toBe(
      "HEALTH_CHECK_TIMEOUT",
    );
    expect(catchConfigError(() => loadConfig({}, { HEALTH_CHECK_INTERVAL: "abc" })).field).toBe(
      "HEALTH_CHECK_INTERVAL",
    );
    expect(catchConfigError(() => loadConfig({ healthTimeoutSeconds: -5 }, {})).field).toBe(
      "health-timeout",
    );
  });

  it("requires integers where counts are expected", () => {
    expect(catchConfigError(() => loadConfig({}, { MAX_PARALLEL_STEPS: "2.5" })).field).toBe(
      "MAX_PARALLEL_STEPS",
    );
    expect(catchConfigError(() => loadConfig({}, { MAX_PARALLEL_STEPS: "0" })).field).toBe(
      "MAX_PARALLEL_STEPS",
    );
  });

  it("rejects unknown log settings", () => {
    expect(catchConfigError(() => loadConfig({}, { LOG_LEVEL: "verbose" })).field).toBe(
      "LOG_LEVEL",
    );
    expect(catchConfigError(() => loadConfig({}, { LOG_FORMAT: "xml" })).field).toBe(
      "LOG_FORMAT",
    );
  });

  // ── Immutability ───────────────────────────────────────────────────────

  it("returns a frozen object with frozen sections", () => {
    const config = loadConfig({}, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.features)).toBe(true);
    expect(Object.isFrozen(config.tests)).toBe(true);
    expect(Object.isFrozen(config.timing)).toBe(true);
    expect(Object.isFrozen(config.logging)).toBe(true);
  });
});
