import { describe, expect, it } from "vitest";
import { bootstrap, createCollaboratorFactory } from "../bootstrap.ts";
import { BufferLogger } from "../observability/logger.ts";
import { DefinitionError } from "../pipeline/definition.ts";
import { PipelineController } from "../pipeline/pipeline-controller.ts";
import { RecordingCommandRunner, testConfig, testDefinition } from "./helpers.ts";

const now = () => new Date(2026, 2, 1, 9, 0, 0);

describe("bootstrap", () => {
  it("loads the bundled definition and wires a controller", async () => {
    const logger = new BufferLogger();

    const deployment = await bootstrap(testConfig(), { logger, now });

    expect(deployment.runId).toMatch(/^deploy-local-20260301-[0-9a-f]{6}$/);
    expect(deployment.logFile).toBeNull();
    expect(deployment.controller).toBeInstanceOf(PipelineController);
    expect(deployment.definition.stages.map((s) => s.name)).toEqual(["infrastructure", "application"]);
    expect(logger.has("info", "Pipeline definition loaded")).toBe(true);
  });

  it("prunes monitoring and directory services when they are disabled", async () => {
    const config = testConfig({ monitoring: false, directoryService: false });

    const { definition } = await bootstrap(config, { logger: new BufferLogger(), now });

    const services = definition.stages.flatMap((s) => s.steps.map((step) => step.service));
    expect(services).toEqual(["postgres", "redis", "zookeeper", "kafka", "banking-app", "nginx"]);
    expect(definition.validation.map((t) => t.name)).toEqual(["banking-app", "postgres", "kafka"]);
  });

  it("rejects a missing definition file", async () => {
    const config = testConfig({ definitionPath: "/tmp/banking-under-test/missing.yaml" });

    await expect(bootstrap(config, { logger: new BufferLogger(), now })).rejects.toBeInstanceOf(
      DefinitionError,
    );
  });
});

describe("createCollaboratorFactory", () => {
  const environment = {
    projectName: "banking-staging",
    composeFile: "/srv/banking/docker-compose.staging.yml",
    variables: { DB_PASSWORD: "test-password" },
    directories: [],
  };

  function collaborators() {
    const commands = new RecordingCommandRunner();
    const config = testConfig({ environment: "staging" }, { PROJECT_ROOT: "/srv/banking" });
    const factory = createCollaboratorFactory(
      config,
      testDefinition(),
      commands,
      () => Promise.reject(new Error("no network in tests")),
      new BufferLogger(),
    );
    return { commands, built: factory(environment) };
  }

  it("binds Compose calls to the environment's project and file", async () => {
    const { commands, built } = collaborators();

    await built.stack.ensureRunning("postgres");

    expect(commands.lines()).toEqual([
      "docker compose -p banking-staging -f /srv/banking/docker-compose.staging.yml up -d --no-deps postgres",
    ]);
    expect(commands.calls[0]?.options?.env).toEqual({ DB_PASSWORD: "test-password" });
    expect(commands.calls[0]?.options?.cwd).toBe("/srv/banking");
  });

  it("runs the Gradle suites in the project root", async () => {
    const { commands, built } = collaborators();

    await built.suites.unit.run();
    await built.suites.integration.run();

    expect(commands.lines()).toEqual([
      "./gradlew test --parallel --continue",
      "./gradlew integrationTest --continue",
    ]);
    expect(commands.calls.map((c) => c.options?.cwd)).toEqual(["/srv/banking", "/srv/banking"]);
  });

  it("runs the e2e suite through the Compose test profile", async () => {
    const { commands, built } = collaborators();

    expect(await built.suites.e2e.run()).toEqual({ status: "passed" });
    expect(commands.lines()).toEqual([
      "docker compose -p banking-staging -f /srv/banking/docker-compose.staging.yml --profile e2e-testing up --abort-on-container-exit --exit-code-from test-runner test-runner",
    ]);
  });
});
