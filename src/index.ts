// ── Public API ───────────────────────────────────────────────────────────────
export * from "./types/index.ts";
export * from "./health/index.ts";
export * from "./orchestration/index.ts";
export * from "./pipeline/index.ts";
export * from "./observability/index.ts";

export {
  loadConfig,
  ConfigError,
  ENVIRONMENTS,
  DEFAULT_DEFINITION_PATH,
  type Environment,
  type PipelineConfig,
  type ConfigOverrides,
} from "./config.ts";

export { systemClock, AbortError, boundedSignal, type Clock, type BoundedSignal } from "./runtime/clock.ts";
export { generateRunId, runLogFileName, formatFileTimestamp } from "./runtime/id.ts";
export {
  bootstrap,
  createCollaboratorFactory,
  type Deployment,
  type BootstrapOptions,
} from "./bootstrap.ts";
