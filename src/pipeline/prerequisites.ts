import type { Logger } from "../observability/logger.ts";
import {
  commandSucceeded,
  describeFailure,
  type CommandRunner,
  type HostInspector,
} from "../orchestration/types.ts";

export interface PrerequisiteConfig {
  readonly dockerBinary: string;
  /** Free space is measured on the filesystem holding this path. */
  readonly projectRoot: string;
  readonly minFreeDiskBytes: number;
  readonly daemonTimeoutMs: number;
}

export const DEFAULT_DAEMON_TIMEOUT_MS = 15_000;

export interface PrerequisiteReport {
  readonly passed: boolean;
  readonly failures: readonly string[];
}

const GIB = 1024 ** 3;

function gib(bytes: number): string {
  return `${(bytes / GIB).toFixed(1)} GiB`;
}

/**
 * Host checks that must pass before anything is torn down or built:
 * required tools on PATH, a reachable container daemon, enough free disk.
 * Every check runs; the report lists every failure.
 */
export class PrerequisiteChecker {
  constructor(
    private readonly host: HostInspector,
    private readonly commands: CommandRunner,
    private readonly config: PrerequisiteConfig,
    private readonly logger: Logger,
  ) {}

  async check(tools: readonly string[], signal?: AbortSignal): Promise<PrerequisiteReport> {
    const failures: string[] = [];

    for (const tool of tools) {
      const path = await this.host.findExecutable(tool);
      if (path === null) {
        failures.push(`${tool} is not installed or not on PATH`);
      } else {
        this.logger.debug(`Found ${tool}`, { tool, path });
      }
    }

    const daemon = await this.commands.run(this.config.dockerBinary, ["info"], {
      timeoutMs: this.config.daemonTimeoutMs,
      signal,
    });
    if (!commandSucceeded(daemon)) {
      failures.push(`Docker daemon is not reachable (${describeFailure(daemon)})`);
    }

    try {
      const free = await this.host.freeDiskBytes(this.config.projectRoot);
      if (free < this.config.minFreeDiskBytes) {
        failures.push(
          `Insufficient disk space: ${gib(free)} free, ${gib(this.config.minFreeDiskBytes)} required`,
        );
      }
    } catch (err) {
      failures.push(
        `Could not read free disk space: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    for (const failure of failures) this.logger.error(failure);
    if (failures.length === 0) {
      this.logger.info("Prerequisites satisfied", { event: "success" });
    }
    return { passed: failures.length === 0, failures };
  }
}
