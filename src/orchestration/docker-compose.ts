import type { Logger } from "../observability/logger.ts";
import {
  CONTAINER_HEALTH,
  SERVICE_STATES,
  type BuildImagesOptions,
  type CommandOptions,
  type CommandOutcome,
  type CommandRunner,
  type ContainerHealth,
  type ServiceState,
  type ServiceStatus,
  type StackOperations,
  type TeardownOptions,
} from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface ComposeRuntimeConfig {
  readonly dockerBinary: string;
  readonly projectName: string;
  readonly composeFile: string;
  readonly projectRoot: string;
  /** Variables from the environment file, passed to every compose call. */
  readonly env: Readonly<Record<string, string>>;
  readonly commandTimeoutMs: number;
  readonly buildTimeoutMs: number;
}

export const DEFAULT_COMPOSE_TIMEOUTS = {
  commandTimeoutMs: 120_000,
  buildTimeoutMs: 30 * 60_000,
} as const;

// ── `ps --format json` parsing ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toServiceState(raw: unknown): ServiceState {
  const value = typeof raw === "string" ? raw.toLowerCase() : "";
  return SERVICE_STATES.find((state) => state === value) ?? "missing";
}

function toContainerHealth(raw: unknown): ContainerHealth | null {
  const value = typeof raw === "string" ? raw.toLowerCase() : "";
  return CONTAINER_HEALTH.find((health) => health === value) ?? null;
}

/**
 * Parse `docker compose ps --format json` output, which older Compose
 * releases print as one JSON array and newer ones as one object per line.
 */
export function parseComposePs(output: string, service: string): ServiceStatus {
  const trimmed = output.trim();
  const missing: ServiceStatus = {
    service,
    state: "missing",
    health: null,
    detail: "no container",
  };
  if (trimmed === "") return missing;

  let entries: unknown[];
  try {
    if (trimmed.startsWith("[")) {
      const parsed: unknown = JSON.parse(trimmed);
      entries = Array.isArray(parsed) ? parsed : [];
    } else {
      entries = trimmed
        .split("\n")
        .filter((line) => line.trim() !== "")
        .map((line): unknown => JSON.parse(line));
    }
  } catch {
    return { ...missing, detail: "unparseable compose ps output" };
  }

  const entry = entries.find(
    (candidate) => isRecord(candidate) && candidate["Service"] === service,
  );
  if (!isRecord(entry)) return missing;

  const state = toServiceState(entry["State"]);
  const health = toContainerHealth(entry["Health"]);
  const status = typeof entry["Status"] === "string" ? entry["Status"] : state;
  return { service, state, health, detail: status };
}

// ── DockerComposeRuntime ────────────────────────────────────────────────────

/** Orchestration collaborator backed by the `docker compose` CLI. */
export class DockerComposeRuntime implements StackOperations {
  constructor(
    private readonly commands: CommandRunner,
    private readonly config: ComposeRuntimeConfig,
    private readonly logger: Logger,
  ) {}

  private compose(
    args: readonly string[],
    options: { globalArgs?: readonly string[]; timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<CommandOutcome> {
    const commandOptions: CommandOptions = {
      cwd: this.config.projectRoot,
      env: this.config.env,
      timeoutMs: options.timeoutMs ?? this.config.commandTimeoutMs,
      signal: options.signal,
    };
    return this.commands.run(
      this.config.dockerBinary,
      [
        "compose",
        "-p",
        this.config.projectName,
        "-f",
        this.config.composeFile,
        ...(options.globalArgs ?? []),
        ...args,
      ],
      commandOptions,
    );
  }

  ensureRunning(service: string, signal?: AbortSignal): Promise<CommandOutcome> {
    return this.compose(["up", "-d", "--no-deps", service], { signal });
  }

  async status(service: string, signal?: AbortSignal): Promise<ServiceStatus> {
    const outcome = await this.compose(["ps", "--all", "--format", "json", service], { signal });
    if (outcome.exitCode !== 0 || outcome.error !== undefined) {
      return {
        service,
        state: "missing",
        health: null,
        detail: outcome.error ?? (outcome.stderr.trim() || "compose ps failed"),
      };
    }
    return parseComposePs(outcome.stdout, service);
  }

  exec(
    service: string,
    command: readonly string[],
    options: { readonly timeoutMs?: number; readonly signal?: AbortSignal } = {},
  ): Promise<CommandOutcome> {
    return this.compose(["exec", "-T", service, ...command], options);
  }

  async teardown(options: TeardownOptions): Promise<readonly CommandOutcome[]> {
    const docker = this.config.dockerBinary;
    const prune = (kind: string): Promise<CommandOutcome> =>
      this.commands.run(docker, [kind, "prune", "-f"], {
        timeoutMs: this.config.commandTimeoutMs,
        signal: options.signal,
      });

    const outcomes: CommandOutcome[] = [];
    outcomes.push(
      await this.compose(["down", "--remove-orphans", "--volumes"], { signal: options.signal }),
    );
    outcomes.push(await prune("container"));
    outcomes.push(await prune("network"));

    if (options.removeImages) {
      this.logger.info("Removing images and volumes for a full rebuild");
      outcomes.push(
        await this.compose(["down", "--rmi", "all", "--volumes"], { signal: options.signal }),
      );
      outcomes.push(await prune("volume"));
      outcomes.push(await prune("image"));
    }
    return outcomes;
  }

  buildImages(options: BuildImagesOptions): Promise<CommandOutcome> {
    return this.compose(["build", ...(options.noCache ? ["--no-cache"] : [])], {
      timeoutMs: this.config.buildTimeoutMs,
      signal: options.signal,
    });
  }

  runProfile(profile: string, service: string, signal?: AbortSignal): Promise<CommandOutcome> {
    return this.compose(
      ["up", "--abort-on-container-exit", "--exit-code-from", service, service],
      { globalArgs: ["--profile", profile], timeoutMs: this.config.buildTimeoutMs, signal },
    );
  }
}
