// ── Collaborator contracts ────────────────────────────────────────────────────
export {
  commandSucceeded,
  describeFailure,
  SERVICE_STATES,
  CONTAINER_HEALTH,
  type CommandOptions,
  type CommandOutcome,
  type CommandRunner,
  type ServiceState,
  type ContainerHealth,
  type ServiceStatus,
  type ServiceRuntime,
  type ServiceExecutor,
  type TeardownOptions,
  type BuildImagesOptions,
  type StackOperations,
  type BuildOptions,
  type BuildResult,
  type BuildTool,
  type FixtureLoadResult,
  type FixtureLoader,
  type HostInspector,
} from "./types.ts";

// ── Implementations ───────────────────────────────────────────────────────────
export {
  SpawnCommandRunner,
  DEFAULT_SPAWN_COMMAND_RUNNER_CONFIG,
  type SpawnCommandRunnerConfig,
} from "./command-runner.ts";

export {
  DockerComposeRuntime,
  DEFAULT_COMPOSE_TIMEOUTS,
  parseComposePs,
  type ComposeRuntimeConfig,
} from "./docker-compose.ts";

export {
  GradleComposeBuild,
  DEFAULT_GRADLE_BUILD_CONFIG,
  type GradleComposeBuildConfig,
} from "./gradle-build.ts";

export { FileFixtureLoader } from "./fixture-loader.ts";
export { NodeHostInspector } from "./host-inspector.ts";
