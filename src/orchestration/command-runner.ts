import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "../observability/logger.ts";
import type { CommandOptions, CommandOutcome, CommandRunner } from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface SpawnCommandRunnerConfig {
  /** Output kept per stream; older output is dropped from the front. */
  readonly maxOutputBytes: number;
  /** Grace period between SIGTERM and SIGKILL. */
  readonly killGraceMs: number;
}

export const DEFAULT_SPAWN_COMMAND_RUNNER_CONFIG: SpawnCommandRunnerConfig = {
  maxOutputBytes: 64 * 1024,
  killGraceMs: 5_000,
};

function appendBounded(buffer: string, chunk: string, max: number): string {
  const next = buffer + chunk;
  return next.length > max ? next.slice(next.length - max) : next;
}

// ── SpawnCommandRunner ──────────────────────────────────────────────────────

/**
 * Runs commands as child processes without a shell. Never rejects: a command
 * that cannot start, times out or is cancelled yields an outcome with `error`.
 */
export class SpawnCommandRunner implements CommandRunner {
  private readonly config: SpawnCommandRunnerConfig;

  constructor(
    private readonly logger: Logger,
    config?: Partial<SpawnCommandRunnerConfig>,
  ) {
    this.config = { ...DEFAULT_SPAWN_COMMAND_RUNNER_CONFIG, ...config };
  }

  run(
    command: string,
    args: readonly string[],
    options: CommandOptions = {},
  ): Promise<CommandOutcome> {
    const label = [command, ...args].join(" ");
    const startedAt = Date.now();
    const { maxOutputBytes, killGraceMs } = this.config;

    this.logger.debug("Running command", { command: label, cwd: options.cwd });

    return new Promise<CommandOutcome>((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      let child: ChildProcess | undefined;

      const terminate = (): void => {
        if (!child || child.exitCode !== null) return;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child?.kill("SIGKILL"), killGraceMs);
        killTimer.unref();
      };

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };

      const finish = (exitCode: number | null, error?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        options.signal?.removeEventListener("abort", onAbort);

        const outcome: CommandOutcome = {
          command: label,
          exitCode,
          stdout,
          stderr,
          durationMs: Date.now() - startedAt,
          timedOut,
          ...(error !== undefined ? { error } : {}),
        };
        this.logger.debug("Command finished", {
          command: label,
          exitCode,
          durationMs: outcome.durationMs,
          error,
        });
        resolve(outcome);
      };

      if (options.signal?.aborted) {
        finish(null, "cancelled before start");
        return;
      }

      try {
        child = spawn(command, [...args], {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (err) {
        finish(null, `failed to start: ${err instanceof Error ? err.message : String(err)}`);
        return;
      }

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout = appendBounded(stdout, chunk.toString(), maxOutputBytes);
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = appendBounded(stderr, chunk.toString(), maxOutputBytes);
      });

      child.on("error", (err) => {
        finish(null, `failed to start: ${err.message}`);
      });

      child.on("close", (code) => {
        if (timedOut) {
          finish(code, `timed out after ${options.timeoutMs}ms`);
        } else if (cancelled) {
          finish(code, "cancelled");
        } else {
          finish(code);
        }
      });

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          terminate();
        }, options.timeoutMs);
      }

      options.signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
