import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";

// ── Environments ───────────────────────────────────────────────────────────

export const ENVIRONMENTS = ["local", "test", "staging", "production"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export const DEFAULT_DEFINITION_PATH = fileURLToPath(
  new URL("../config/pipeline.yaml", import.meta.url),
);

// ── Pipeline Configuration ─────────────────────────────────────────────────

export interface PipelineConfig {
  readonly environment: Environment;
  readonly projectRoot: string;
  readonly definitionPath: string;
  readonly features: {
    readonly monitoring: boolean;
    readonly directoryService: boolean;
    readonly forceRebuild: boolean;
    readonly parallelExecution: boolean;
    readonly cleanupOnFailure: boolean;
  };
  readonly tests: {
    readonly unit: boolean;
    readonly integration: boolean;
    readonly e2e: boolean;
    readonly api: boolean;
  };
  readonly timing: {
    readonly healthTimeoutMs: number;
    readonly pollIntervalMs: number;
    readonly progressIntervalMs: number;
    readonly validationTimeoutMs: number;
    readonly cleanupTimeoutMs: number;
  };
  readonly resources: {
    readonly minFreeDiskBytes: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly maxParallelSteps: number;
  readonly dryRun: boolean;
}

/** Command-line values. Anything set here wins over the environment. */
export interface ConfigOverrides {
  readonly environment?: string;
  readonly skipTests?: boolean;
  readonly skipUnitTests?: boolean;
  readonly skipIntegrationTests?: boolean;
  readonly skipE2eTests?: boolean;
  readonly skipApiTests?: boolean;
  readonly forceRebuild?: boolean;
  readonly monitoring?: boolean;
  readonly directoryService?: boolean;
  readonly parallelExecution?: boolean;
  readonly healthTimeoutSeconds?: number;
  readonly pollIntervalSeconds?: number;
  readonly definitionPath?: string;
  readonly cleanupOnFailure?: boolean;
  readonly dryRun?: boolean;
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Value parsing ──────────────────────────────────────────────────────────

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];
const GIB = 1024 ** 3;

function parseBoolean(field: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new ConfigError(
    `${field} must be one of true/false/1/0/yes/no, got "${raw}".`,
    field,
  );
}

function parsePositive(
  field: string,
  raw: string | undefined,
  fallback: number,
  integer: boolean,
): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `${field} must be a positive ${integer ? "integer" : "number"}, got "${raw}".`,
      field,
    );
  }
  return value;
}

function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive number, got ${value}.`, field);
  }
  return value;
}

function parseMember<T extends string>(
  field: string,
  raw: string,
  allowed: readonly T[],
): T {
  const value = raw.trim();
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(
      `${field} must be one of: ${allowed.join(", ")}. Got "${raw}".`,
      field,
    );
  }
  return match;
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Build the run configuration: defaults, then environment variables, then
 * command-line overrides.
 *
 * @param envOverrides Replaces `process.env` as the variable source (tests).
 * @throws ConfigError naming the offending field.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  envOverrides?: Record<string, string | undefined>,
): PipelineConfig {
  const source = envOverrides ?? process.env;
  const env = (key: string): string | undefined => source[key];

  // ── Environment ──────────────────────────────────────────────────────
  const environment = parseMember(
    overrides.environment !== undefined ? "environment" : "ENVIRONMENT",
    overrides.environment ?? env("ENVIRONMENT") ?? "local",
    ENVIRONMENTS,
  );

  // ── Paths ────────────────────────────────────────────────────────────
  const projectRootRaw = env("PROJECT_ROOT")?.trim();
  const projectRoot = projectRootRaw
    ? resolve(process.cwd(), projectRootRaw)
    : process.cwd();

  const definitionRaw = overrides.definitionPath ?? env("PIPELINE_DEFINITION")?.trim();
  const definitionPath = definitionRaw
    ? resolve(process.cwd(), definitionRaw)
    : DEFAULT_DEFINITION_PATH;

  // ── Features ─────────────────────────────────────────────────────────
  const features = {
    monitoring:
      overrides.monitoring ?? parseBoolean("ENABLE_MONITORING", env("ENABLE_MONITORING"), true),
    directoryService:
      overrides.directoryService ?? parseBoolean("ENABLE_LDAP", env("ENABLE_LDAP"), true),
    forceRebuild:
      overrides.forceRebuild ?? parseBoolean("FORCE_REBUILD", env("FORCE_REBUILD"), false),
    parallelExecution:
      overrides.parallelExecution ??
      parseBoolean("PARALLEL_EXECUTION", env("PARALLEL_EXECUTION"), true),
    cleanupOnFailure: overrides.cleanupOnFailure ?? true,
  };

  // ── Test sub-runs ────────────────────────────────────────────────────
  const skipAll = overrides.skipTests ?? parseBoolean("SKIP_TESTS", env("SKIP_TESTS"), false);
  const skip = (override: boolean | undefined, key: string): boolean =>
    skipAll || (override ?? parseBoolean(key, env(key), false));

  const tests = {
    unit: !skip(overrides.skipUnitTests, "SKIP_UNIT_TESTS"),
    integration: !skip(overrides.skipIntegrationTests, "SKIP_INTEGRATION_TESTS"),
    e2e: !skip(overrides.skipE2eTests, "SKIP_E2E_TESTS"),
    api: !skip(overrides.skipApiTests, "SKIP_API_TESTS"),
  };

  // ── Timing ───────────────────────────────────────────────────────────
  const healthTimeoutSeconds =
    overrides.healthTimeoutSeconds !== undefined
      ? requirePositive("health-timeout", overrides.healthTimeoutSeconds)
      : parsePositive("HEALTH_CHECK_TIMEOUT", env("HEALTH_CHECK_TIMEOUT"), 300, false);

  const pollIntervalSeconds =
    overrides.pollIntervalSeconds !== undefined
      ? requirePositive("poll-interval", overrides.pollIntervalSeconds)
      : parsePositive("HEALTH_CHECK_INTERVAL", env("HEALTH_CHECK_INTERVAL"), 5, false);

  const timing = {
    healthTimeoutMs: healthTimeoutSeconds * 1000,
    pollIntervalMs: pollIntervalSeconds * 1000,
    progressIntervalMs: 30_000,
    validationTimeoutMs:
      parsePositive("VALIDATION_TIMEOUT", env("VALIDATION_TIMEOUT"), 10, false) * 1000,
    cleanupTimeoutMs:
      parsePositive("CLEANUP_TIMEOUT", env("CLEANUP_TIMEOUT"), 120, false) * 1000,
  };

  // ── Resources ────────────────────────────────────────────────────────
  const minFreeDiskBytes =
    parsePositive("MIN_FREE_DISK_GB", env("MIN_FREE_DISK_GB"), 10, false) * GIB;

  // ── Logging ──────────────────────────────────────────────────────────
  const logging = {
    level: parseMember("LOG_LEVEL", env("LOG_LEVEL") || "info", LOG_LEVELS),
    format: parseMember("LOG_FORMAT", env("LOG_FORMAT") || "pretty", LOG_FORMATS),
  };

  // ── Concurrency ──────────────────────────────────────────────────────
  const maxParallelSteps = parsePositive(
    "MAX_PARALLEL_STEPS",
    env("MAX_PARALLEL_STEPS"),
    4,
    true,
  );

  // ── Build and freeze ─────────────────────────────────────────────────
  return Object.freeze({
    environment,
    projectRoot,
    definitionPath,
    features: Object.freeze(features),
    tests: Object.freeze(tests),
    timing: Object.freeze(timing),
    resources: Object.freeze({ minFreeDiskBytes }),
    logging: Object.freeze(logging),
    maxParallelSteps,
    dryRun: overrides.dryRun ?? false,
  });
}
