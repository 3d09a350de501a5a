import { connect } from "node:net";
import {
  describeFailure,
  type CommandOutcome,
  type CommandRunner,
  type ServiceExecutor,
  type ServiceRuntime,
} from "../orchestration/types.ts";
import type { HealthCheckAttempt, HealthCheckDescriptor } from "../types/health.ts";

// ── HealthCheck contract ──────────────────────────────────────────────────────

/** One readiness signal. `check` never rejects. */
export interface HealthCheck {
  readonly target: string;
  check(signal: AbortSignal): Promise<HealthCheckAttempt>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HealthCheckDeps {
  readonly runtime: ServiceRuntime;
  readonly executor: ServiceExecutor;
  readonly commands: CommandRunner;
  readonly fetch: FetchFn;
  readonly cwd: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Cancels an unread body so the connection is released. Returns a note on failure. */
async function discardBody(response: Response): Promise<string> {
  try {
    await response.body?.cancel();
    return "";
  } catch (err) {
    return ` (body not released: ${errorMessage(err)})`;
  }
}

function fromOutcome(label: string, outcome: CommandOutcome): HealthCheckAttempt {
  if (outcome.exitCode === 0 && outcome.error === undefined) {
    return { status: "healthy", message: `${label} succeeded` };
  }
  // Could not run at all: no verdict on the target itself.
  if (outcome.exitCode === null) {
    return { status: "unknown", message: `${label}: ${describeFailure(outcome)}` };
  }
  return { status: "unhealthy", message: `${label}: ${describeFailure(outcome)}` };
}

// ── Service status ────────────────────────────────────────────────────────────

export class ServiceStatusCheck implements HealthCheck {
  constructor(
    readonly target: string,
    private readonly runtime: ServiceRuntime,
  ) {}

  async check(signal: AbortSignal): Promise<HealthCheckAttempt> {
    try {
      const status = await this.runtime.status(this.target, signal);
      if (status.state !== "running") {
        return { status: "unhealthy", message: `${this.target} is ${status.state} (${status.detail})` };
      }
      if (status.health === null || status.health === "healthy") {
        return { status: "healthy", message: `${this.target} is running (${status.detail})` };
      }
      return { status: "unhealthy", message: `${this.target} reports ${status.health}` };
    } catch (err) {
      return { status: "unknown", message: `status query failed: ${errorMessage(err)}` };
    }
  }
}

// ── HTTP ──────────────────────────────────────────────────────────────────────

export class HttpCheck implements HealthCheck {
  constructor(
    readonly target: string,
    private readonly url: string,
    private readonly fetchFn: FetchFn,
    private readonly expectStatus?: string,
  ) {}

  async check(signal: AbortSignal): Promise<HealthCheckAttempt> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, { method: "GET", signal });
    } catch (err) {
      return { status: "unknown", message: `GET ${this.url} failed: ${errorMessage(err)}` };
    }

    if (!response.ok || this.expectStatus === undefined) {
      const note = await discardBody(response);
      return {
        status: response.ok ? "healthy" : "unhealthy",
        message: `GET ${this.url} returned ${response.status}${note}`,
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { status: "unhealthy", message: `GET ${this.url} returned a non-JSON body` };
    }
    const reported = isRecord(body) ? body["status"] : undefined;
    if (reported === this.expectStatus) {
      return { status: "healthy", message: `GET ${this.url} reports ${this.expectStatus}` };
    }
    return {
      status: "unhealthy",
      message: `GET ${this.url} reports status ${JSON.stringify(reported ?? null)}, expected ${this.expectStatus}`,
    };
  }
}

// ── TCP ───────────────────────────────────────────────────────────────────────

export class TcpCheck implements HealthCheck {
  constructor(
    readonly target: string,
    private readonly host: string,
    private readonly port: number,
  ) {}

  check(signal: AbortSignal): Promise<HealthCheckAttempt> {
    const address = `${this.host}:${this.port}`;
    return new Promise<HealthCheckAttempt>((resolve) => {
      const socket = connect({ host: this.host, port: this.port });

      const finish = (attempt: HealthCheckAttempt): void => {
        signal.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve(attempt);
      };
      const onAbort = (): void => {
        finish({ status: "unknown", message: `connect ${address} did not complete` });
      };

      socket.once("connect", () => {
        finish({ status: "healthy", message: `${address} accepts connections` });
      });
      socket.once("error", (err) => {
        finish({ status: "unknown", message: `connect ${address} failed: ${err.message}` });
      });

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }
    });
  }
}

// ── Commands ──────────────────────────────────────────────────────────────────

export class ExecCheck implements HealthCheck {
  constructor(
    readonly target: string,
    private readonly service: string,
    private readonly command: readonly string[],
    private readonly executor: ServiceExecutor,
  ) {}

  async check(signal: AbortSignal): Promise<HealthCheckAttempt> {
    const outcome = await this.executor.exec(this.service, this.command, { signal });
    return fromOutcome(`${this.command.join(" ")} in ${this.service}`, outcome);
  }
}

export class CommandCheck implements HealthCheck {
  constructor(
    readonly target: string,
    private readonly command: readonly string[],
    private readonly commands: CommandRunner,
    private readonly cwd: string,
  ) {}

  async check(signal: AbortSignal): Promise<HealthCheckAttempt> {
    const [program, ...args] = this.command;
    if (program === undefined) {
      return { status: "unhealthy", message: "empty command" };
    }
    const outcome = await this.commands.run(program, args, { cwd: this.cwd, signal });
    return fromOutcome(this.command.join(" "), outcome);
  }
}

// ── Factory ───────────────────────────────────────────────────────────────────

export function createHealthCheck(
  target: string,
  descriptor: HealthCheckDescriptor,
  deps: HealthCheckDeps,
): HealthCheck {
  switch (descriptor.type) {
    case "service":
      return new ServiceStatusCheck(target, deps.runtime);
    case "http":
      return new HttpCheck(target, descriptor.url, deps.fetch, descriptor.expectStatus);
    case "tcp":
      return new TcpCheck(target, descriptor.host, descriptor.port);
    case "exec":
      return new ExecCheck(target, descriptor.service, descriptor.command, deps.executor);
    case "command":
      return new CommandCheck(target, descriptor.command, deps.commands, deps.cwd);
  }
}
