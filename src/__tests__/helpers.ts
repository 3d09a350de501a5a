import { loadConfig, type ConfigOverrides, type PipelineConfig } from "../config.ts";
import type { HealthCheck } from "../health/checks.ts";
import { AbortError, type Clock } from "../runtime/clock.ts";
import type { SuiteOutcome, TestSuite } from "../pipeline/test-suites.ts";
import type { TestSuiteName } from "../pipeline/types.ts";
import type {
  BuildImagesOptions,
  BuildOptions,
  BuildResult,
  BuildTool,
  CommandOptions,
  CommandOutcome,
  CommandRunner,
  ContainerHealth,
  FixtureLoadResult,
  FixtureLoader,
  HostInspector,
  ServiceStatus,
  StackOperations,
  TeardownOptions,
} from "../orchestration/types.ts";
import type { HealthCheckAttempt, HealthCheckDescriptor } from "../types/health.ts";
import type { FixtureSpec, PipelineDefinition, Stage, Step } from "../types/pipeline.ts";

// ── Fake Clock ──────────────────────────────────────────────────────────────

/** Sleeping advances time instantly. */
export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortError();
    this.sleeps.push(ms);
    this.current += ms;
  }
}

// ── Command outcomes ────────────────────────────────────────────────────────

export function outcome(overrides: Partial<CommandOutcome> = {}): CommandOutcome {
  return {
    command: "test-command",
    exitCode: 0,
    stdout: "",
    stderr: "",
    durationMs: 1,
    timedOut: false,
    ...overrides,
  };
}

export interface RecordedCommand {
  readonly command: string;
  readonly args: readonly string[];
  readonly options?: CommandOptions;
}

export type CommandScript = (
  line: string,
  call: RecordedCommand,
) => Partial<CommandOutcome> | undefined;

/** Records every command and answers from a script (exit 0 by default). */
export class RecordingCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly script: CommandScript = () => undefined) {}

  async run(
    command: string,
    args: readonly string[],
    options?: CommandOptions,
  ): Promise<CommandOutcome> {
    const call: RecordedCommand = { command, args, options };
    this.calls.push(call);
    const line = [command, ...args].join(" ");
    return outcome({ command: line, ...this.script(line, call) });
  }

  lines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }
}

// ── Fake Stack ──────────────────────────────────────────────────────────────

export type HealthScript = ContainerHealth | ((statusCall: number) => ContainerHealth);

/**
 * In-memory orchestration collaborator. Services become "running" once
 * launched; their health follows a per-service script (healthy by default).
 */
export class FakeStack implements StackOperations {
  readonly launches: string[] = [];
  readonly statusCalls = new Map<string, number>();
  readonly execCalls: { service: string; command: readonly string[] }[] = [];
  readonly teardowns: TeardownOptions[] = [];
  readonly imageBuilds: BuildImagesOptions[] = [];
  readonly profileRuns: { profile: string; service: string }[] = [];

  readonly failLaunch = new Set<string>();
  readonly healthScripts = new Map<string, HealthScript>();
  readonly execExitCodes = new Map<string, number>();
  profileExitCode = 0;
  imageBuildExitCode = 0;
  teardownExitCode = 0;
  /** Awaited inside ensureRunning; lets tests hold a launch open. */
  launchHook: ((service: string) => Promise<void>) | undefined;
  /** Awaited inside status; lets tests hold a status query open. */
  statusHook: ((service: string, signal?: AbortSignal) => Promise<void>) | undefined;

  private readonly running = new Set<string>();

  async ensureRunning(service: string): Promise<CommandOutcome> {
    this.launches.push(service);
    if (this.launchHook) await this.launchHook(service);
    if (this.failLaunch.has(service)) {
      return outcome({ command: `up ${service}`, exitCode: 1, stderr: `no such image: ${service}` });
    }
    this.running.add(service);
    return outcome({ command: `up ${service}` });
  }

  async status(service: string, signal?: AbortSignal): Promise<ServiceStatus> {
    if (this.statusHook) await this.statusHook(service, signal);
    const call = (this.statusCalls.get(service) ?? 0) + 1;
    this.statusCalls.set(service, call);
    if (!this.running.has(service)) {
      return { service, state: "missing", health: null, detail: "no container" };
    }
    const script = this.healthScripts.get(service) ?? "healthy";
    const health = typeof script === "function" ? script(call) : script;
    return { service, state: "running", health, detail: `Up (${health})` };
  }

  async exec(service: string, command: readonly string[]): Promise<CommandOutcome> {
    this.execCalls.push({ service, command });
    const exitCode = this.execExitCodes.get(service) ?? 0;
    return outcome({
      command: command.join(" "),
      exitCode,
      stderr: exitCode === 0 ? "" : `${service} not ready`,
    });
  }

  async teardown(options: TeardownOptions): Promise<readonly CommandOutcome[]> {
    this.teardowns.push(options);
    this.running.clear();
    const count = options.removeImages ? 6 : 3;
    return Array.from({ length: count }, (_, i) =>
      outcome({
        command: `teardown-${i}`,
        exitCode: this.teardownExitCode,
        stderr: this.teardownExitCode === 0 ? "" : "daemon busy",
      }),
    );
  }

  async buildImages(options: BuildImagesOptions): Promise<CommandOutcome> {
    this.imageBuilds.push(options);
    return outcome({ command: "build", exitCode: this.imageBuildExitCode });
  }

  async runProfile(profile: string, service: string): Promise<CommandOutcome> {
    this.profileRuns.push({ profile, service });
    return outcome({ command: `profile ${profile}`, exitCode: this.profileExitCode });
  }

  isRunning(service: string): boolean {
    return this.running.has(service);
  }
}

// ── Host, build, fixtures and suites ────────────────────────────────────────

const GIB = 1024 ** 3;

export class StubHost implements HostInspector {
  constructor(
    private readonly installed: readonly string[] = ["docker", "java"],
    private readonly free: number | Error = 50 * GIB,
  ) {}

  async findExecutable(name: string): Promise<string | null> {
    return this.installed.includes(name) ? `/usr/bin/${name}` : null;
  }

  async freeDiskBytes(): Promise<number> {
    if (this.free instanceof Error) throw this.free;
    return this.free;
  }
}

export class StubBuild implements BuildTool {
  readonly calls: BuildOptions[] = [];
  error: string | undefined;

  async build(options: BuildOptions): Promise<BuildResult> {
    this.calls.push(options);
    return this.error === undefined
      ? { status: "succeeded", steps: [], durationMs: 1 }
      : { status: "failed", steps: [], durationMs: 1, error: this.error };
  }
}

export class StubFixtures implements FixtureLoader {
  readonly failing = new Set<string>();

  async load(fixtures: readonly FixtureSpec[]): Promise<FixtureLoadResult> {
    return {
      loaded: fixtures.filter((f) => !this.failing.has(f.name)).map((f) => f.name),
      failed: fixtures
        .filter((f) => this.failing.has(f.name))
        .map((f) => ({ name: f.name, error: "EACCES: permission denied" })),
    };
  }
}

export class StubSuite implements TestSuite {
  calls = 0;

  constructor(
    readonly name: TestSuiteName,
    private readonly outcome: SuiteOutcome = { status: "passed" },
  ) {}

  async run(): Promise<SuiteOutcome> {
    this.calls++;
    return this.outcome;
  }
}

export function stubSuites(failing: readonly TestSuiteName[] = []) {
  const make = (name: TestSuiteName) =>
    new StubSuite(name, failing.includes(name) ? { status: "failed", detail: `${name} broke` } : undefined);
  return { unit: make("unit"), integration: make("integration"), e2e: make("e2e"), api: make("api") };
}

// ── Scripted health checks ──────────────────────────────────────────────────

/** A check that answers from a list; the last answer repeats. */
export class ScriptedCheck implements HealthCheck {
  calls = 0;

  constructor(
    readonly target: string,
    private readonly answers: readonly HealthCheckAttempt[],
  ) {}

  async check(): Promise<HealthCheckAttempt> {
    const answer = this.answers[Math.min(this.calls, this.answers.length - 1)];
    this.calls++;
    return answer ?? { status: "unknown", message: "no scripted answer" };
  }
}

export const healthy: HealthCheckAttempt = { status: "healthy", message: "ok" };
export const unhealthy: HealthCheckAttempt = { status: "unhealthy", message: "not ready" };

// ── Config and definitions ──────────────────────────────────────────────────

/** Config with short timings: health timeout 10 s, poll interval 2 s. */
export function testConfig(
  overrides: ConfigOverrides = {},
  env: Record<string, string> = {},
): PipelineConfig {
  return loadConfig(
    { healthTimeoutSeconds: 10, pollIntervalSeconds: 2, ...overrides },
    { LOG_FORMAT: "json", PROJECT_ROOT: "/tmp/banking-under-test", ...env },
  );
}

export function step(
  service: string,
  options: {
    dependsOn?: readonly string[];
    bestEffort?: boolean;
    healthCheck?: HealthCheckDescriptor;
  } = {},
): Step {
  return {
    service,
    dependsOn: options.dependsOn ?? [],
    healthCheck: options.healthCheck ?? { type: "service" },
    bestEffort: options.bestEffort ?? false,
  };
}

export function stage(name: string, steps: readonly Step[]): Stage {
  return { name, steps };
}

export function testDefinition(overrides: Partial<PipelineDefinition> = {}): PipelineDefinition {
  return {
    stages: [
      stage("infrastructure", [
        step("postgres"),
        step("redis"),
        step("zookeeper"),
        step("kafka", { dependsOn: ["zookeeper"] }),
      ]),
      stage("application", [step("banking-app", { dependsOn: ["postgres", "kafka"] })]),
    ],
    validation: [
      { name: "banking-app", check: { type: "service" } },
      { name: "postgres", check: { type: "exec", service: "postgres", command: ["pg_isready"] } },
    ],
    apiChecks: [],
    fixtures: [],
    prerequisites: { tools: ["docker"] },
    directories: ["logs"],
    endpoints: [{ label: "Banking API", url: "http://localhost:8080/api" }],
    ...overrides,
  };
}
