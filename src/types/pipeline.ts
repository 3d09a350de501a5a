import type { HealthCheckDescriptor } from "./health.ts";

// ── Feature Toggles ──────────────────────────────────────────────────────────

export const FEATURE_TOGGLES = ["monitoring", "directoryService"] as const;

export type FeatureToggle = (typeof FEATURE_TOGGLES)[number];

// ── Stages and Steps ─────────────────────────────────────────────────────────

export interface Step {
  readonly service: string;
  readonly dependsOn: readonly string[];
  readonly healthCheck: HealthCheckDescriptor;
  readonly bestEffort: boolean;
}

export interface Stage {
  readonly name: string;
  readonly steps: readonly Step[];
}

export const INFRASTRUCTURE_STAGE = "infrastructure";
export const APPLICATION_STAGE = "application";

// ── Validation, API Checks, Fixtures ─────────────────────────────────────────

export interface ValidationTarget {
  readonly name: string;
  readonly check: HealthCheckDescriptor;
}

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface ApiCheck {
  readonly name: string;
  readonly method: HttpMethod;
  readonly url: string;
  readonly expectStatus: number;
  readonly body?: unknown;
}

export interface FixtureSpec {
  readonly name: string;
  /** Absolute path of the fixture file shipped with the deployer. */
  readonly source: string;
  /** Destination relative to the project root. */
  readonly destination: string;
}

export interface ServiceEndpoint {
  readonly label: string;
  readonly url: string;
}

// ── Pipeline Definition ──────────────────────────────────────────────────────

export interface PipelineDefinition {
  readonly stages: readonly Stage[];
  readonly validation: readonly ValidationTarget[];
  readonly apiChecks: readonly ApiCheck[];
  readonly fixtures: readonly FixtureSpec[];
  readonly prerequisites: {
    readonly tools: readonly string[];
  };
  readonly directories: readonly string[];
  readonly endpoints: readonly ServiceEndpoint[];
}

// ── Pipeline States ──────────────────────────────────────────────────────────

export const PIPELINE_STATES = [
  "init",
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
  "failed",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export const TERMINAL_STATES: readonly PipelineState[] = ["succeeded", "failed"];

/** States a run passes through between `init` and a terminal state, in order. */
export const RUN_SEQUENCE = [
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
] as const satisfies readonly PipelineState[];

export type RunState = (typeof RUN_SEQUENCE)[number];

// ── Pipeline State Machine ───────────────────────────────────────────────────

export const VALID_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  init: ["prereq-check", "failed"],
  "prereq-check": ["env-setup", "failed"],
  "env-setup": ["cleanup", "failed"],
  cleanup: ["build", "failed"],
  build: ["fixture-load", "failed"],
  "fixture-load": ["infra-stage", "failed"],
  "infra-stage": ["app-stage", "failed"],
  "app-stage": ["test-stage", "failed"],
  "test-stage": ["validation-gate", "failed"],
  "validation-gate": ["summary", "failed"],
  summary: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
} as const;

export class InvalidTransitionError extends Error {
  override readonly name = "InvalidTransitionError";
  constructor(
    public readonly from: PipelineState,
    public readonly to: PipelineState,
  ) {
    super(`Invalid pipeline transition: "${from}" -> "${to}"`);
  }
}

export function validateTransition(from: PipelineState, to: PipelineState): void {
  const allowed = VALID_TRANSITIONS[from];
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}
