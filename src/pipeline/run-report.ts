import type { Environment } from "../config.ts";
import type { PipelineState } from "../types/pipeline.ts";
import type {
  CleanupResult,
  FixtureReport,
  RunReport,
  StageResult,
  StateTransition,
  TestRunResult,
  ValidationResult,
} from "./types.ts";

// ── Builder ─────────────────────────────────────────────────────────────────

export interface RunReportHeader {
  readonly runId: string;
  readonly environment: Environment;
  readonly startedAt: Date;
  readonly logFile: string | null;
}

export class ReportFinalizedError extends Error {
  override readonly name = "ReportFinalizedError";

  constructor(readonly runId: string) {
    super(`Run report ${runId} is already finalized`);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * The only writer of a run's report. Appends are synchronous, so records
 * from concurrent steps never interleave; after `finalize` every append
 * throws.
 */
export class RunReportBuilder {
  private readonly stages: StageResult[] = [];
  private readonly cleanup: CleanupResult[] = [];
  private readonly transitions: StateTransition[] = [];
  private readonly warnings: string[] = [];
  private readonly failures: string[] = [];
  private tests: readonly TestRunResult[] = [];
  private validation: ValidationResult | null = null;
  private fixtures: FixtureReport | null = null;
  private finalized: RunReport | null = null;

  constructor(private readonly header: RunReportHeader) {}

  recordTransition(transition: StateTransition): void {
    this.assertOpen();
    this.transitions.push(transition);
  }

  addStage(result: StageResult): void {
    this.assertOpen();
    this.stages.push(result);
  }

  setTests(runs: readonly TestRunResult[]): void {
    this.assertOpen();
    this.tests = runs;
  }

  setValidation(result: ValidationResult): void {
    this.assertOpen();
    this.validation = result;
  }

  setFixtures(report: FixtureReport): void {
    this.assertOpen();
    this.fixtures = report;
  }

  addCleanup(result: CleanupResult): void {
    this.assertOpen();
    this.cleanup.push(result);
    this.warnings.push(...result.warnings);
  }

  warn(message: string): void {
    this.assertOpen();
    this.warnings.push(message);
  }

  fail(message: string): void {
    this.assertOpen();
    this.failures.push(message);
  }

  get failureCount(): number {
    return this.failures.length;
  }

  finalize(finalState: PipelineState, completedAt: Date = new Date()): RunReport {
    this.assertOpen();
    const status = finalState === "succeeded" && this.failures.length === 0 ? "succeeded" : "failed";

    this.finalized = deepFreeze<RunReport>({
      runId: this.header.runId,
      environment: this.header.environment,
      startedAt: this.header.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      status,
      finalState,
      stateHistory: [...this.transitions],
      stages: [...this.stages],
      tests: [...this.tests],
      validation: this.validation,
      fixtures: this.fixtures,
      cleanup: [...this.cleanup],
      warnings: [...this.warnings],
      failures: [...this.failures],
      totalDurationMs: completedAt.getTime() - this.header.startedAt.getTime(),
      logFile: this.header.logFile,
    });
    return this.finalized;
  }

  private assertOpen(): void {
    if (this.finalized !== null) throw new ReportFinalizedError(this.header.runId);
  }
}

// ── Formatting ──────────────────────────────────────────────────────────────

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function mark(status: string): string {
  switch (status) {
    case "passed":
    case "healthy":
    case "succeeded":
      return "[ok]  ";
    case "skipped":
      return "[skip]";
    default:
      return "[fail]";
  }
}

/** Human-readable summary printed at the end of a run. */
export function formatRunReport(report: RunReport): string {
  const lines: string[] = [
    "==================== Deployment Summary ====================",
    `Run:          ${report.runId}`,
    `Environment:  ${report.environment}`,
    `Status:       ${report.status.toUpperCase()} (final state: ${report.finalState})`,
    `Duration:     ${seconds(report.totalDurationMs)}`,
  ];

  if (report.stages.length > 0) {
    lines.push("", "Stages:");
    for (const stage of report.stages) {
      lines.push(`  ${mark(stage.status)} ${stage.stage} (${seconds(stage.durationMs)})`);
      for (const step of stage.steps) {
        const tag = step.bestEffort ? " (best effort)" : "";
        const reason = step.status === "healthy" ? "" : `: ${step.reason ?? step.status}`;
        lines.push(`      ${mark(step.status)} ${step.service}${tag}${reason}`);
      }
    }
  }

  if (report.tests.length > 0) {
    lines.push("", "Tests:");
    for (const run of report.tests) {
      const detail = run.status === "passed" || run.detail === undefined ? "" : `: ${run.detail}`;
      lines.push(`  ${mark(run.status)} ${run.suite}${detail}`);
    }
  }

  if (report.validation !== null) {
    lines.push("", "Validation:");
    for (const target of report.validation.targets) {
      const message = target.status === "passed" ? "" : `: ${target.message}`;
      lines.push(`  ${mark(target.status)} ${target.name}${message}`);
    }
  }

  if (report.fixtures !== null) {
    lines.push(
      "",
      `Fixtures: ${report.fixtures.loaded.length} loaded, ${report.fixtures.failed.length} failed`,
    );
  }

  if (report.warnings.length > 0) {
    lines.push("", "Warnings:", ...report.warnings.map((w) => `  - ${w}`));
  }
  if (report.failures.length > 0) {
    lines.push("", "Failures:", ...report.failures.map((f) => `  - ${f}`));
  }
  if (report.logFile !== null) {
    lines.push("", `Log file: ${report.logFile}`);
  }
  return lines.join("\n");
}
