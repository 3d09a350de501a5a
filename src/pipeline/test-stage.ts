import type { PipelineConfig } from "../config.ts";
import type { Logger } from "../observability/logger.ts";
import type { SuiteOutcome, TestSuite } from "./test-suites.ts";
import { TEST_SUITES, type TestRunResult, type TestStageResult, type TestSuiteName } from "./types.ts";

/**
 * Runs the test sub-runs in a fixed order: unit, integration, e2e, api.
 * A disabled sub-run is recorded as skipped and never started. A failed
 * sub-run does not stop the ones after it.
 */
export class TestStage {
  constructor(
    private readonly suites: Readonly<Record<TestSuiteName, TestSuite>>,
    private readonly logger: Logger,
  ) {}

  async run(config: PipelineConfig, signal?: AbortSignal): Promise<TestStageResult> {
    const runs: TestRunResult[] = [];

    for (const name of TEST_SUITES) {
      if (!config.tests[name]) {
        this.logger.info(`Skipping ${name} tests`, { suite: name });
        runs.push({ suite: name, status: "skipped", durationMs: 0, detail: "disabled" });
        continue;
      }
      if (signal?.aborted) {
        runs.push({ suite: name, status: "skipped", durationMs: 0, detail: "run cancelled" });
        continue;
      }
      runs.push(await this.runSuite(this.suites[name], signal));
    }

    const failed = runs.filter((r) => r.status === "failed").map((r) => r.suite);
    if (failed.length > 0) {
      this.logger.error(`Test failures in: ${failed.join(", ")}`, { failed });
    }
    return { status: failed.length === 0 ? "passed" : "failed", runs };
  }

  private async runSuite(suite: TestSuite, signal?: AbortSignal): Promise<TestRunResult> {
    const startedAt = Date.now();
    this.logger.info(`Running ${suite.name} tests...`, { event: "step", suite: suite.name });

    let outcome: SuiteOutcome;
    try {
      outcome = await suite.run(signal);
    } catch (err) {
      outcome = {
        status: "failed",
        detail: err instanceof Error ? err.message : String(err),
      };
    }

    const result: TestRunResult = {
      suite: suite.name,
      status: outcome.status,
      durationMs: Date.now() - startedAt,
      ...(outcome.detail !== undefined ? { detail: outcome.detail } : {}),
    };

    if (result.status === "passed") {
      this.logger.info(`${suite.name} tests passed`, { event: "success", suite: suite.name });
    } else {
      this.logger.error(`${suite.name} tests failed`, { suite: suite.name, detail: result.detail });
    }
    return result;
  }
}
