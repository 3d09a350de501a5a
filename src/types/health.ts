// ── Health Status ────────────────────────────────────────────────────────────

export const HEALTH_STATUSES = ["healthy", "unhealthy", "unknown"] as const;

export type HealthStatus = (typeof HEALTH_STATUSES)[number];

// ── Health Check Descriptors ─────────────────────────────────────────────────

export const HEALTH_CHECK_TYPES = [
  "service",
  "http",
  "tcp",
  "exec",
  "command",
] as const;

export type HealthCheckType = (typeof HEALTH_CHECK_TYPES)[number];

/**
 * How a target's readiness is observed.
 *
 * - `service`: the orchestration runtime's own status report
 * - `http`: a readiness endpoint; `expectStatus` pins the JSON `status` field
 * - `tcp`: a port accepting connections
 * - `exec`: a command run inside a running service container
 * - `command`: a command run on the host
 */
export type HealthCheckDescriptor =
  | { readonly type: "service" }
  | {
      readonly type: "http";
      readonly url: string;
      readonly expectStatus?: string;
    }
  | { readonly type: "tcp"; readonly host: string; readonly port: number }
  | {
      readonly type: "exec";
      readonly service: string;
      readonly command: readonly string[];
    }
  | { readonly type: "command"; readonly command: readonly string[] };

// ── Probe Outcomes ───────────────────────────────────────────────────────────

/** One poll of a readiness signal. */
export interface HealthCheckAttempt {
  readonly status: HealthStatus;
  readonly message: string;
}

/** Outcome of a whole polling window. */
export interface HealthCheckResult {
  readonly target: string;
  readonly status: HealthStatus;
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly message: string;
}
