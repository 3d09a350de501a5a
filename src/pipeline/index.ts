export { PipelineController } from "./pipeline-controller.ts";
export type {
  EnvironmentCollaborators,
  CollaboratorFactory,
  PipelineControllerDeps,
} from "./pipeline-controller.ts";

export {
  type PipelineErrorCode,
  type LaunchResult,
  type StepStatus,
  type StepResult,
  type StageResult,
  type TargetResult,
  type ValidationResult,
  type TestSuiteName,
  type TestRunResult,
  type TestStageResult,
  type CleanupPhase,
  type CleanupResult,
  type FixtureReport,
  type StateTransition,
  type RunReport,
  type PipelineRunResult,
  PipelineError,
  TEST_SUITES,
} from "./types.ts";

export {
  runStepGraph,
  type GraphTask,
  type StepGraphOptions,
  type StepGraphResult,
} from "./concurrency.ts";

export {
  DefinitionError,
  parseDefinition,
  loadDefinition,
  validateDefinition,
  buildServiceCatalog,
  findStage,
  describePlan,
  type FeatureSet,
  type ParseOptions,
} from "./definition.ts";

// ── Stage components ─────────────────────────────────────────────────────────
export { ServiceLauncher } from "./service-launcher.ts";
export { StageRunner, type StageRunnerDeps } from "./stage-runner.ts";
export { ValidationGate, type ValidationGateDeps } from "./validation-gate.ts";
export { TestStage } from "./test-stage.ts";
export {
  CommandTestSuite,
  ComposeProfileSuite,
  ApiSmokeSuite,
  UNIT_TEST_ARGS,
  INTEGRATION_TEST_ARGS,
  E2E_PROFILE,
  E2E_SERVICE,
  type SuiteOutcome,
  type TestSuite,
  type CommandSuiteConfig,
} from "./test-suites.ts";
export { Cleanup, type CleanupOptions } from "./cleanup.ts";
export {
  PrerequisiteChecker,
  DEFAULT_DAEMON_TIMEOUT_MS,
  type PrerequisiteConfig,
  type PrerequisiteReport,
} from "./prerequisites.ts";
export {
  setupEnvironment,
  type EnvironmentContext,
  type EnvironmentSetup,
} from "./environment.ts";

// ── Run bookkeeping ──────────────────────────────────────────────────────────
export { PipelineStateMachine, type TransitionListener } from "./state-machine.ts";
export {
  RunReportBuilder,
  ReportFinalizedError,
  formatRunReport,
  type RunReportHeader,
} from "./run-report.ts";
