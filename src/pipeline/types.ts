import type { HealthCheckResult } from "../types/health.ts";
import type { PipelineState } from "../types/pipeline.ts";
import type { Environment } from "../config.ts";

// ── Pipeline Error ──────────────────────────────────────────────────────────

export type PipelineErrorCode =
  | "PREREQUISITE_FAILED"
  | "ENV_SETUP_FAILED"
  | "BUILD_FAILED"
  | "STAGE_FAILED"
  | "ABORTED"
  | "INVALID_DEFINITION"
  | "UNKNOWN";

export class PipelineError extends Error {
  override readonly name = "PipelineError";

  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly state?: PipelineState,
    public override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Launch and Step Results ─────────────────────────────────────────────────

export interface LaunchResult {
  readonly service: string;
  readonly status: "launched" | "failed";
  /** Services started by this launch, dependencies first. */
  readonly launched: readonly string[];
  readonly durationMs: number;
  readonly error?: string;
}

export type StepStatus = "healthy" | "failed" | "skipped";

export interface StepResult {
  readonly service: string;
  readonly status: StepStatus;
  readonly bestEffort: boolean;
  readonly launch?: LaunchResult;
  readonly health?: HealthCheckResult;
  readonly durationMs: number;
  readonly reason?: string;
}

// ── Stage Result ────────────────────────────────────────────────────────────

export interface StageResult {
  readonly stage: string;
  readonly status: "passed" | "failed";
  /** In declared step order. */
  readonly steps: readonly StepResult[];
  readonly durationMs: number;
  readonly failedService?: string;
}

// ── Validation ──────────────────────────────────────────────────────────────

export interface TargetResult {
  readonly name: string;
  readonly status: "passed" | "failed";
  readonly message: string;
  readonly durationMs: number;
}

export interface ValidationResult {
  readonly status: "passed" | "failed";
  readonly targets: readonly TargetResult[];
  readonly failedTargets: readonly string[];
  readonly durationMs: number;
}

// ── Tests ───────────────────────────────────────────────────────────────────

export const TEST_SUITES = ["unit", "integration", "e2e", "api"] as const;

export type TestSuiteName = (typeof TEST_SUITES)[number];

export interface TestRunResult {
  readonly suite: TestSuiteName;
  readonly status: "passed" | "failed" | "skipped";
  readonly durationMs: number;
  readonly detail?: string;
}

export interface TestStageResult {
  readonly status: "passed" | "failed";
  readonly runs: readonly TestRunResult[];
}

// ── Cleanup and Fixtures ────────────────────────────────────────────────────

export type CleanupPhase = "pre-deploy" | "rollback";

export interface CleanupResult {
  readonly phase: CleanupPhase;
  readonly commands: number;
  readonly warnings: readonly string[];
  readonly timedOut: boolean;
  readonly durationMs: number;
}

export interface FixtureReport {
  readonly loaded: readonly string[];
  readonly failed: readonly string[];
}

// ── Run Report ──────────────────────────────────────────────────────────────

export interface StateTransition {
  readonly from: PipelineState;
  readonly to: PipelineState;
  readonly at: string;
}

export interface RunReport {
  readonly runId: string;
  readonly environment: Environment;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly status: "succeeded" | "failed";
  readonly finalState: PipelineState;
  readonly stateHistory: readonly StateTransition[];
  readonly stages: readonly StageResult[];
  readonly tests: readonly TestRunResult[];
  readonly validation: ValidationResult | null;
  readonly fixtures: FixtureReport | null;
  readonly cleanup: readonly CleanupResult[];
  readonly warnings: readonly string[];
  readonly failures: readonly string[];
  readonly totalDurationMs: number;
  readonly logFile: string | null;
}

export interface PipelineRunResult {
  readonly report: RunReport;
  readonly exitCode: number;
  readonly error?: PipelineError;
}
