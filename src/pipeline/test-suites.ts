import type { FetchFn } from "../health/checks.ts";
import {
  commandSucceeded,
  describeFailure,
  type CommandRunner,
  type StackOperations,
} from "../orchestration/types.ts";
import type { ApiCheck } from "../types/pipeline.ts";
import type { TestSuiteName } from "./types.ts";

// ── Suite contract ──────────────────────────────────────────────────────────

export interface SuiteOutcome {
  readonly status: "passed" | "failed";
  readonly detail?: string;
}

/** One test sub-run. `run` reports failure in its outcome and never rejects. */
export interface TestSuite {
  readonly name: TestSuiteName;
  run(signal?: AbortSignal): Promise<SuiteOutcome>;
}

// ── Host command suites ─────────────────────────────────────────────────────

export interface CommandSuiteConfig {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly timeoutMs: number;
}

export const UNIT_TEST_ARGS = ["test", "--parallel", "--continue"] as const;
export const INTEGRATION_TEST_ARGS = ["integrationTest", "--continue"] as const;

export class CommandTestSuite implements TestSuite {
  constructor(
    readonly name: TestSuiteName,
    private readonly commands: CommandRunner,
    private readonly config: CommandSuiteConfig,
  ) {}

  async run(signal?: AbortSignal): Promise<SuiteOutcome> {
    const { command, args, cwd, timeoutMs } = this.config;
    const outcome = await this.commands.run(command, args, { cwd, timeoutMs, signal });
    return commandSucceeded(outcome)
      ? { status: "passed" }
      : { status: "failed", detail: describeFailure(outcome) };
  }
}

// ── Compose profile suite ───────────────────────────────────────────────────

export const E2E_PROFILE = "e2e-testing";
export const E2E_SERVICE = "test-runner";

/** Runs a Compose profile until its runner container exits; the exit code is the verdict. */
export class ComposeProfileSuite implements TestSuite {
  readonly name = "e2e";

  constructor(
    private readonly stack: Pick<StackOperations, "runProfile">,
    private readonly profile: string = E2E_PROFILE,
    private readonly service: string = E2E_SERVICE,
  ) {}

  async run(signal?: AbortSignal): Promise<SuiteOutcome> {
    const outcome = await this.stack.runProfile(this.profile, this.service, signal);
    return commandSucceeded(outcome)
      ? { status: "passed" }
      : { status: "failed", detail: `${this.service}: ${describeFailure(outcome)}` };
  }
}

// ── API smoke suite ─────────────────────────────────────────────────────────

/**
 * Calls every configured endpoint once, in order, and compares the status
 * code. All checks run; the detail lists each failure.
 */
export class ApiSmokeSuite implements TestSuite {
  readonly name = "api";

  constructor(
    private readonly checks: readonly ApiCheck[],
    private readonly fetchFn: FetchFn,
    private readonly requestTimeoutMs: number,
  ) {}

  async run(signal?: AbortSignal): Promise<SuiteOutcome> {
    const failures: string[] = [];
    for (const check of this.checks) {
      const failure = await this.call(check, signal);
      if (failure !== null) failures.push(`${check.name} (${failure})`);
    }

    if (failures.length === 0) {
      return { status: "passed", detail: `${this.checks.length} API checks passed` };
    }
    return {
      status: "failed",
      detail: `${failures.length}/${this.checks.length} API checks failed: ${failures.join(", ")}`,
    };
  }

  private async call(check: ApiCheck, signal?: AbortSignal): Promise<string | null> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const init: RequestInit = {
      method: check.method,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      ...(check.body !== undefined
        ? { body: JSON.stringify(check.body), headers: { "content-type": "application/json" } }
        : {}),
    };

    try {
      const response = await this.fetchFn(check.url, init);
      if (response.status === check.expectStatus) return null;
      return `expected ${check.expectStatus}, got ${response.status}`;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }
}
