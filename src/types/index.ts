// ── Type re-exports ──────────────────────────────────────────────────────────
export type {
  HealthStatus,
  HealthCheckType,
  HealthCheckDescriptor,
  HealthCheckAttempt,
  HealthCheckResult,
} from "./health.ts";

export type {
  FeatureToggle,
  Step,
  Stage,
  ValidationTarget,
  HttpMethod,
  ApiCheck,
  FixtureSpec,
  ServiceEndpoint,
  PipelineDefinition,
  PipelineState,
  RunState,
} from "./pipeline.ts";

// ── Runtime constants and state machine ──────────────────────────────────────
export { HEALTH_STATUSES, HEALTH_CHECK_TYPES } from "./health.ts";

export {
  FEATURE_TOGGLES,
  INFRASTRUCTURE_STAGE,
  APPLICATION_STAGE,
  HTTP_METHODS,
  PIPELINE_STATES,
  TERMINAL_STATES,
  RUN_SEQUENCE,
  VALID_TRANSITIONS,
  InvalidTransitionError,
  validateTransition,
} from "./pipeline.ts";
