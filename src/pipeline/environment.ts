import { access, mkdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse as parseDotenv } from "dotenv";
import type { PipelineConfig } from "../config.ts";
import type { Logger } from "../observability/logger.ts";
import type { PipelineDefinition } from "../types/pipeline.ts";

// ── Environment Context ─────────────────────────────────────────────────────

/** Everything the environment-bound collaborators need. */
export interface EnvironmentContext {
  readonly projectName: string;
  readonly composeFile: string;
  /** Variables from `.env.<environment>`, passed to every Compose call. */
  readonly variables: Readonly<Record<string, string>>;
  /** Absolute paths of the directories created for this run. */
  readonly directories: readonly string[];
}

export type EnvironmentSetup = (
  config: PipelineConfig,
  definition: PipelineDefinition,
  logger: Logger,
) => Promise<EnvironmentContext>;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ── Setup ───────────────────────────────────────────────────────────────────

/**
 * Prepares the host for a deployment of `config.environment`.
 * Rejects when a directory cannot be created or the env file cannot be read.
 */
export const setupEnvironment: EnvironmentSetup = async (config, definition, logger) => {
  const root = config.projectRoot;

  const directories = definition.directories.map((dir) => resolve(root, dir));
  for (const dir of directories) {
    await mkdir(dir, { recursive: true });
  }

  const projectName = `banking-${config.environment}`;

  const perEnvironment = join(root, `docker-compose.${config.environment}.yml`);
  const composeFile = (await exists(perEnvironment))
    ? perEnvironment
    : join(root, "docker-compose.yml");

  let variables: Record<string, string> = {};
  const envFile = join(root, `.env.${config.environment}`);
  if (await exists(envFile)) {
    logger.info(`Loading environment configuration from .env.${config.environment}`);
    variables = parseDotenv(await readFile(envFile, "utf-8"));
  }

  logger.info("Environment setup completed", {
    event: "success",
    projectName,
    composeFile,
    variables: Object.keys(variables).length,
  });

  return Object.freeze({
    projectName,
    composeFile,
    variables: Object.freeze(variables),
    directories,
  });
};
