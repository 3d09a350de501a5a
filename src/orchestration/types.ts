import type { FixtureSpec } from "../types/pipeline.ts";

// ── Commands ────────────────────────────────────────────────────────────────

export interface CommandOptions {
  readonly cwd?: string;
  /** Added to the inherited environment of the child process. */
  readonly env?: Readonly<Record<string, string>>;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface CommandOutcome {
  /** Rendered command line, for logs. */
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly timedOut: boolean;
  /** Set when the process could not start, timed out or was cancelled. */
  readonly error?: string;
}

export interface CommandRunner {
  run(
    command: string,
    args: readonly string[],
    options?: CommandOptions,
  ): Promise<CommandOutcome>;
}

export function commandSucceeded(outcome: CommandOutcome): boolean {
  return outcome.exitCode === 0 && outcome.error === undefined;
}

/** Short diagnostic for a failed command: the error or the last stderr line. */
export function describeFailure(outcome: CommandOutcome): string {
  if (outcome.error !== undefined) return outcome.error;
  const lastLine = outcome.stderr.trim().split("\n").pop()?.trim();
  const code = `exit code ${outcome.exitCode ?? "none"}`;
  return lastLine ? `${code}: ${lastLine}` : code;
}

// ── Service runtime ─────────────────────────────────────────────────────────

export const SERVICE_STATES = [
  "running",
  "created",
  "restarting",
  "paused",
  "exited",
  "dead",
  "missing",
] as const;

export type ServiceState = (typeof SERVICE_STATES)[number];

export const CONTAINER_HEALTH = ["healthy", "unhealthy", "starting"] as const;

export type ContainerHealth = (typeof CONTAINER_HEALTH)[number];

export interface ServiceStatus {
  readonly service: string;
  readonly state: ServiceState;
  /** `null` when the container declares no health check. */
  readonly health: ContainerHealth | null;
  readonly detail: string;
}

/** What launching and the `service` health check need from orchestration. */
export interface ServiceRuntime {
  ensureRunning(service: string, signal?: AbortSignal): Promise<CommandOutcome>;
  status(service: string, signal?: AbortSignal): Promise<ServiceStatus>;
}

export interface ServiceExecutor {
  exec(
    service: string,
    command: readonly string[],
    options?: { readonly timeoutMs?: number; readonly signal?: AbortSignal },
  ): Promise<CommandOutcome>;
}

export interface TeardownOptions {
  /** Also remove images and prune volumes and images. */
  readonly removeImages: boolean;
  readonly signal?: AbortSignal;
}

export interface BuildImagesOptions {
  readonly noCache: boolean;
  readonly signal?: AbortSignal;
}

/** Full surface of the container orchestration collaborator. */
export interface StackOperations extends ServiceRuntime, ServiceExecutor {
  teardown(options: TeardownOptions): Promise<readonly CommandOutcome[]>;
  buildImages(options: BuildImagesOptions): Promise<CommandOutcome>;
  runProfile(profile: string, service: string, signal?: AbortSignal): Promise<CommandOutcome>;
}

// ── Build ───────────────────────────────────────────────────────────────────

export interface BuildOptions {
  readonly forceRebuild: boolean;
  readonly parallel: boolean;
  readonly signal?: AbortSignal;
}

export interface BuildResult {
  readonly status: "succeeded" | "failed";
  readonly steps: readonly CommandOutcome[];
  readonly durationMs: number;
  readonly error?: string;
}

export interface BuildTool {
  build(options: BuildOptions): Promise<BuildResult>;
}

// ── Fixtures ────────────────────────────────────────────────────────────────

export interface FixtureLoadResult {
  readonly loaded: readonly string[];
  readonly failed: readonly { readonly name: string; readonly error: string }[];
}

export interface FixtureLoader {
  load(fixtures: readonly FixtureSpec[]): Promise<FixtureLoadResult>;
}

// ── Host ────────────────────────────────────────────────────────────────────

export interface HostInspector {
  /** Absolute path of an executable on PATH, or null. */
  findExecutable(name: string): Promise<string | null>;
  freeDiskBytes(path: string): Promise<number>;
}
