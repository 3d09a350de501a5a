import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { bootstrap, type Deployment } from "./bootstrap.ts";
import {
  ConfigError,
  ENVIRONMENTS,
  loadConfig,
  type ConfigOverrides,
  type PipelineConfig,
} from "./config.ts";
import { DefinitionError, describePlan } from "./pipeline/definition.ts";
import { formatRunReport } from "./pipeline/run-report.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

type Writable<T> = { -readonly [K in keyof T]: T[K] };

export interface ParsedArgs {
  help: boolean;
  overrides: Writable<ConfigOverrides>;
}

const BOOLEAN_FLAGS = new Map<string, (o: Writable<ConfigOverrides>) => void>([
  ["--skip-tests", (o) => { o.skipTests = true; }],
  ["--skip-unit-tests", (o) => { o.skipUnitTests = true; }],
  ["--skip-integration-tests", (o) => { o.skipIntegrationTests = true; }],
  ["--skip-e2e-tests", (o) => { o.skipE2eTests = true; }],
  ["--skip-api-tests", (o) => { o.skipApiTests = true; }],
  ["--force-rebuild", (o) => { o.forceRebuild = true; }],
  ["--no-monitoring", (o) => { o.monitoring = false; }],
  ["--no-ldap", (o) => { o.directoryService = false; }],
  ["--sequential", (o) => { o.parallelExecution = false; }],
  ["--parallel", (o) => { o.parallelExecution = true; }],
  ["--keep-on-failure", (o) => { o.cleanupOnFailure = false; }],
  ["--dry-run", (o) => { o.dryRun = true; }],
]);

function requireValue(argv: readonly string[], i: number, flag: string, what: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`${flag} requires ${what}`);
  }
  return value;
}

function requireSeconds(argv: readonly string[], i: number, flag: string): number {
  const raw = requireValue(argv, i, flag, "a number of seconds");
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`${flag} must be a positive number of seconds, got "${raw}"`);
  }
  return seconds;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into config overrides.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, overrides: {} };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i]!;
    const setFlag = BOOLEAN_FLAGS.get(arg);

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (setFlag !== undefined) {
      setFlag(result.overrides);
      i++;
    } else if (arg === "--environment" || arg === "-e") {
      result.overrides.environment = requireValue(
        argv,
        i,
        arg,
        `one of: ${ENVIRONMENTS.join(", ")}`,
      );
      i += 2;
    } else if (arg === "--health-timeout") {
      result.overrides.healthTimeoutSeconds = requireSeconds(argv, i, arg);
      i += 2;
    } else if (arg === "--poll-interval") {
      result.overrides.pollIntervalSeconds = requireSeconds(argv, i, arg);
      i += 2;
    } else if (arg === "--definition") {
      result.overrides.definitionPath = requireValue(argv, i, arg, "a file path");
      i += 2;
    } else {
      throw new Error(`Unknown flag: ${arg}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Banking stack deployer

Usage:
  npm start -- [options]

Options:
  -e, --environment <env>     Target environment: ${ENVIRONMENTS.join(", ")} (default: local)
  --skip-tests                Skip every test sub-run
  --skip-unit-tests           Skip Gradle unit tests
  --skip-integration-tests    Skip Gradle integration tests
  --skip-e2e-tests            Skip the end-to-end Compose profile
  --skip-api-tests            Skip the API smoke checks
  --force-rebuild             Remove images and rebuild without cache
  --no-monitoring             Leave out the monitoring services
  --no-ldap                   Leave out the directory services
  --sequential                Start the services of a stage one at a time
  --parallel                  Start independent services concurrently (default)
  --health-timeout <s>        Seconds to wait for each service (default: 300)
  --poll-interval <s>         Seconds between health probes (default: 5)
  --definition <path>         Pipeline definition file (default: config/pipeline.yaml)
  --keep-on-failure           Leave a failed deployment running for inspection
  --dry-run                   Show the plan without touching the stack
  -h, --help                  Show this help message

Examples:
  npm start -- --environment staging --skip-e2e-tests
  npm start -- -e local --sequential --health-timeout 600
  npm start -- --dry-run --no-monitoring
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  // Parse arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  // Load config
  let config: PipelineConfig;
  try {
    config = loadConfig(args.overrides);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    process.exit(1);
    return;
  }

  // Wire the run
  let deployment: Deployment;
  try {
    deployment = await bootstrap(config);
  } catch (err: unknown) {
    if (err instanceof DefinitionError) {
      console.error(`Invalid pipeline definition: ${err.message}`);
      for (const detail of err.errors) console.error(`  - ${detail}`);
    } else {
      console.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
    return;
  }

  // ── Dry Run ──────────────────────────────────────────────────────────
  if (config.dryRun) {
    const plan = describePlan(deployment.definition);
    deployment.logger.info("Dry run: no service will be touched", { runId: deployment.runId });
    console.log(plan.join("\n"));
    process.exit(0);
    return;
  }

  // ── Deploy ───────────────────────────────────────────────────────────
  const { logger, controller } = deployment;
  const interrupt = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (interrupt.signal.aborted) return;
    logger.warn(`Received ${signal}, stopping the deployment`);
    interrupt.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const { report, exitCode } = await controller.run(interrupt.signal);

  process.removeListener("SIGINT", onSignal);
  process.removeListener("SIGTERM", onSignal);

  console.log(`\n${formatRunReport(report)}`);
  process.exit(exitCode);
}

// Run only when executed as the entry point (not when imported for testing)
const entry = process.argv[1];
if (entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(
      "Fatal: deployment crashed:",
      err instanceof Error ? err.message : String(err),
    );
    process.exit(1);
  });
}
