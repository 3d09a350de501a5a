import { join } from "node:path";
import type { PipelineConfig } from "./config.ts";
import type { FetchFn } from "./health/checks.ts";
import { createLogger, type Logger } from "./observability/logger.ts";
import { SpawnCommandRunner } from "./orchestration/command-runner.ts";
import { DEFAULT_COMPOSE_TIMEOUTS, DockerComposeRuntime } from "./orchestration/docker-compose.ts";
import { FileFixtureLoader } from "./orchestration/fixture-loader.ts";
import { DEFAULT_GRADLE_BUILD_CONFIG, GradleComposeBuild } from "./orchestration/gradle-build.ts";
import { NodeHostInspector } from "./orchestration/host-inspector.ts";
import type { CommandRunner } from "./orchestration/types.ts";
import { loadDefinition } from "./pipeline/definition.ts";
import type { CollaboratorFactory } from "./pipeline/pipeline-controller.ts";
import { PipelineController } from "./pipeline/pipeline-controller.ts";
import { DEFAULT_DAEMON_TIMEOUT_MS, PrerequisiteChecker } from "./pipeline/prerequisites.ts";
import {
  ApiSmokeSuite,
  CommandTestSuite,
  ComposeProfileSuite,
  INTEGRATION_TEST_ARGS,
  UNIT_TEST_ARGS,
} from "./pipeline/test-suites.ts";
import { systemClock } from "./runtime/clock.ts";
import { generateRunId, runLogFileName } from "./runtime/id.ts";
import type { PipelineDefinition } from "./types/pipeline.ts";

const DOCKER_BINARY = "docker";

// ── Deployment Interface ─────────────────────────────────────────────────────

export interface Deployment {
  readonly runId: string;
  readonly logFile: string | null;
  readonly definition: PipelineDefinition;
  readonly logger: Logger;
  readonly controller: PipelineController;
}

export interface BootstrapOptions {
  /** Replaces the pino logger; no run log file is written then. */
  readonly logger?: Logger;
  readonly fetch?: FetchFn;
  readonly now?: () => Date;
}

// ── Environment-bound collaborators ──────────────────────────────────────────

/**
 * Builds the Compose, Gradle, fixture and test-suite collaborators once the
 * environment (project name, compose file, variables) is known.
 */
export function createCollaboratorFactory(
  config: PipelineConfig,
  definition: PipelineDefinition,
  commands: CommandRunner,
  fetchFn: FetchFn,
  logger: Logger,
): CollaboratorFactory {
  return (environment) => {
    const stack = new DockerComposeRuntime(
      commands,
      {
        dockerBinary: DOCKER_BINARY,
        projectName: environment.projectName,
        composeFile: environment.composeFile,
        projectRoot: config.projectRoot,
        env: environment.variables,
        ...DEFAULT_COMPOSE_TIMEOUTS,
      },
      logger.child({ component: "compose" }),
    );

    const gradle = {
      command: DEFAULT_GRADLE_BUILD_CONFIG.gradleCommand,
      cwd: config.projectRoot,
      timeoutMs: DEFAULT_GRADLE_BUILD_CONFIG.timeoutMs,
    };

    return {
      stack,
      build: new GradleComposeBuild(
        commands,
        stack,
        { ...DEFAULT_GRADLE_BUILD_CONFIG, projectRoot: config.projectRoot },
        logger.child({ component: "build" }),
      ),
      fixtures: new FileFixtureLoader(config.projectRoot, logger.child({ component: "fixtures" })),
      suites: {
        unit: new CommandTestSuite("unit", commands, { ...gradle, args: UNIT_TEST_ARGS }),
        integration: new CommandTestSuite("integration", commands, {
          ...gradle,
          args: INTEGRATION_TEST_ARGS,
        }),
        e2e: new ComposeProfileSuite(stack),
        api: new ApiSmokeSuite(definition.apiChecks, fetchFn, config.timing.validationTimeoutMs),
      },
    };
  };
}

// ── Bootstrap ────────────────────────────────────────────────────────────────

/**
 * Wire one deployment run together with real implementations.
 * This is the composition root: the only place concrete classes are chosen.
 *
 * @throws DefinitionError when the pipeline definition is missing or invalid.
 */
export async function bootstrap(
  config: PipelineConfig,
  options: BootstrapOptions = {},
): Promise<Deployment> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  // 1. Run identity, so the logger can carry it from the first line
  const runId = generateRunId(config.environment, startedAt);
  const logFile = options.logger
    ? null
    : join(config.projectRoot, "logs", runLogFileName(startedAt));

  // 2. Logger (stdout, plus the run log file)
  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      base: { module: "deployer" },
      ...(logFile !== null ? { file: logFile } : {}),
    });

  logger.info("Bootstrapping deployment", {
    runId,
    environment: config.environment,
    projectRoot: config.projectRoot,
    definition: config.definitionPath,
  });

  // 3. Pipeline definition, pruned by the feature toggles
  const definition = await loadDefinition(config.definitionPath, {
    monitoring: config.features.monitoring,
    directoryService: config.features.directoryService,
  });
  logger.info("Pipeline definition loaded", {
    stages: definition.stages.map((s) => s.name),
    services: definition.stages.reduce((n, s) => n + s.steps.length, 0),
    validationTargets: definition.validation.length,
  });

  // 4. Host access
  const commands = new SpawnCommandRunner(logger.child({ component: "command-runner" }));
  const prerequisites = new PrerequisiteChecker(
    new NodeHostInspector(),
    commands,
    {
      dockerBinary: DOCKER_BINARY,
      projectRoot: config.projectRoot,
      minFreeDiskBytes: config.resources.minFreeDiskBytes,
      daemonTimeoutMs: DEFAULT_DAEMON_TIMEOUT_MS,
    },
    logger.child({ component: "prerequisites" }),
  );

  // 5. Controller
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const controller = new PipelineController({
    config,
    definition,
    logger,
    clock: systemClock,
    prerequisites,
    commands,
    fetch: fetchFn,
    createCollaborators: createCollaboratorFactory(config, definition, commands, fetchFn, logger),
    runId,
    logFile,
    now,
  });

  return { runId, logFile, definition, logger, controller };
}
