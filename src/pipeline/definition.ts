import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { HEALTH_CHECK_TYPES, type HealthCheckDescriptor } from "../types/health.ts";
import {
  APPLICATION_STAGE,
  FEATURE_TOGGLES,
  HTTP_METHODS,
  INFRASTRUCTURE_STAGE,
  type ApiCheck,
  type FeatureToggle,
  type FixtureSpec,
  type PipelineDefinition,
  type ServiceEndpoint,
  type Stage,
  type Step,
  type ValidationTarget,
} from "../types/pipeline.ts";

// ── Errors ──────────────────────────────────────────────────────────────────

export class DefinitionError extends Error {
  override readonly name = "DefinitionError";

  constructor(
    message: string,
    public readonly errors: readonly string[],
  ) {
    super(message);
  }
}

export type FeatureSet = Readonly<Record<FeatureToggle, boolean>>;

export interface ParseOptions {
  readonly features: FeatureSet;
  /** Fixture sources resolve against this directory. */
  readonly baseDir: string;
}

// ── Shape readers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: string[],
): string | undefined {
  const value = obj[key];
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  errors.push(`${path}.${key} must be a non-empty string`);
  return undefined;
}

function readStringList(
  value: unknown,
  path: string,
  errors: string[],
  { nonEmpty = false }: { nonEmpty?: boolean } = {},
): string[] {
  if (value === undefined && !nonEmpty) return [];
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    errors.push(`${path} must be a list of strings`);
    return [];
  }
  const items = value.filter((item): item is string => typeof item === "string");
  if (nonEmpty && items.length === 0) {
    errors.push(`${path} must not be empty`);
  }
  return items;
}

function readList(
  root: Record<string, unknown>,
  key: string,
  errors: string[],
): unknown[] {
  const value = root[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push(`${key} must be a list`);
    return [];
  }
  return value;
}

/** `requires:` is an optional feature toggle; entries for disabled features are dropped. */
function isEnabled(
  entry: Record<string, unknown>,
  path: string,
  features: FeatureSet,
  errors: string[],
): boolean {
  const requires = entry["requires"];
  if (requires === undefined) return true;
  const toggle = FEATURE_TOGGLES.find((candidate) => candidate === requires);
  if (toggle === undefined) {
    errors.push(`${path}.requires must be one of: ${FEATURE_TOGGLES.join(", ")}`);
    return false;
  }
  return features[toggle];
}

function parseHealthCheck(
  raw: unknown,
  path: string,
  errors: string[],
): HealthCheckDescriptor | undefined {
  if (raw === undefined) return { type: "service" };
  if (!isRecord(raw)) {
    errors.push(`${path} must be a mapping`);
    return undefined;
  }

  switch (raw["type"]) {
    case "service":
      return { type: "service" };
    case "http": {
      const url = readString(raw, "url", path, errors);
      const expect = raw["expectStatus"];
      if (expect !== undefined && typeof expect !== "string") {
        errors.push(`${path}.expectStatus must be a string`);
        return undefined;
      }
      if (url === undefined) return undefined;
      return expect === undefined ? { type: "http", url } : { type: "http", url, expectStatus: expect };
    }
    case "tcp": {
      const host = readString(raw, "host", path, errors);
      const port = raw["port"];
      if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65_535) {
        errors.push(`${path}.port must be an integer between 1 and 65535`);
        return undefined;
      }
      return host === undefined ? undefined : { type: "tcp", host, port };
    }
    case "exec": {
      const service = readString(raw, "service", path, errors);
      const command = readStringList(raw["command"], `${path}.command`, errors, { nonEmpty: true });
      return service === undefined || command.length === 0
        ? undefined
        : { type: "exec", service, command };
    }
    case "command": {
      const command = readStringList(raw["command"], `${path}.command`, errors, { nonEmpty: true });
      return command.length === 0 ? undefined : { type: "command", command };
    }
    default:
      errors.push(`${path}.type must be one of: ${HEALTH_CHECK_TYPES.join(", ")}`);
      return undefined;
  }
}

// ── Section parsers ─────────────────────────────────────────────────────────

function parseStages(root: Record<string, unknown>, options: ParseOptions, errors: string[]): Stage[] {
  const stages: Stage[] = [];
  readList(root, "stages", errors).forEach((rawStage, s) => {
    const path = `stages[${s}]`;
    if (!isRecord(rawStage)) {
      errors.push(`${path} must be a mapping`);
      return;
    }
    const name = readString(rawStage, "name", path, errors);
    const rawSteps = rawStage["steps"];
    if (!Array.isArray(rawSteps)) {
      errors.push(`${path}.steps must be a list`);
      return;
    }

    const steps: Step[] = [];
    rawSteps.forEach((rawStep, i) => {
      const stepPath = `${path}.steps[${i}]`;
      if (!isRecord(rawStep)) {
        errors.push(`${stepPath} must be a mapping`);
        return;
      }
      if (!isEnabled(rawStep, stepPath, options.features, errors)) return;
      const service = readString(rawStep, "service", stepPath, errors);
      const dependsOn = readStringList(rawStep["dependsOn"], `${stepPath}.dependsOn`, errors);
      const healthCheck = parseHealthCheck(rawStep["healthCheck"], `${stepPath}.healthCheck`, errors);
      const bestEffort = rawStep["bestEffort"] ?? false;
      if (typeof bestEffort !== "boolean") {
        errors.push(`${stepPath}.bestEffort must be a boolean`);
        return;
      }
      if (service === undefined || healthCheck === undefined) return;
      steps.push({ service, dependsOn, healthCheck, bestEffort });
    });

    if (name !== undefined) stages.push({ name, steps });
  });
  return stages;
}

function parseTargets(
  root: Record<string, unknown>,
  options: ParseOptions,
  errors: string[],
): ValidationTarget[] {
  const targets: ValidationTarget[] = [];
  readList(root, "validation", errors).forEach((raw, i) => {
    const path = `validation[${i}]`;
    if (!isRecord(raw)) {
      errors.push(`${path} must be a mapping`);
      return;
    }
    if (!isEnabled(raw, path, options.features, errors)) return;
    const name = readString(raw, "name", path, errors);
    const check = parseHealthCheck(raw["check"], `${path}.check`, errors);
    if (name !== undefined && check !== undefined) targets.push({ name, check });
  });
  return targets;
}

function parseApiChecks(
  root: Record<string, unknown>,
  options: ParseOptions,
  errors: string[],
): ApiCheck[] {
  const checks: ApiCheck[] = [];
  readList(root, "apiChecks", errors).forEach((raw, i) => {
    const path = `apiChecks[${i}]`;
    if (!isRecord(raw)) {
      errors.push(`${path} must be a mapping`);
      return;
    }
    if (!isEnabled(raw, path, options.features, errors)) return;
    const name = readString(raw, "name", path, errors);
    const url = readString(raw, "url", path, errors);
    const method = HTTP_METHODS.find((m) => m === (raw["method"] ?? "GET"));
    if (method === undefined) {
      errors.push(`${path}.method must be one of: ${HTTP_METHODS.join(", ")}`);
    }
    const expectStatus = raw["expectStatus"] ?? 200;
    if (typeof expectStatus !== "number" || !Number.isInteger(expectStatus)) {
      errors.push(`${path}.expectStatus must be an integer status code`);
      return;
    }
    if (name === undefined || url === undefined || method === undefined) return;
    checks.push(
      raw["body"] === undefined
        ? { name, method, url, expectStatus }
        : { name, method, url, expectStatus, body: raw["body"] },
    );
  });
  return checks;
}

function parseFixtures(
  root: Record<string, unknown>,
  options: ParseOptions,
  errors: string[],
): FixtureSpec[] {
  const fixtures: FixtureSpec[] = [];
  readList(root, "fixtures", errors).forEach((raw, i) => {
    const path = `fixtures[${i}]`;
    if (!isRecord(raw)) {
      errors.push(`${path} must be a mapping`);
      return;
    }
    if (!isEnabled(raw, path, options.features, errors)) return;
    const name = readString(raw, "name", path, errors);
    const source = readString(raw, "source", path, errors);
    const destination = readString(raw, "destination", path, errors);
    if (destination !== undefined && isAbsolute(destination)) {
      errors.push(`${path}.destination must be relative to the project root`);
      return;
    }
    if (name === undefined || source === undefined || destination === undefined) return;
    fixtures.push({ name, source: resolve(options.baseDir, source), destination });
  });
  return fixtures;
}

function parseEndpoints(
  root: Record<string, unknown>,
  options: ParseOptions,
  errors: string[],
): ServiceEndpoint[] {
  const endpoints: ServiceEndpoint[] = [];
  readList(root, "endpoints", errors).forEach((raw, i) => {
    const path = `endpoints[${i}]`;
    if (!isRecord(raw)) {
      errors.push(`${path} must be a mapping`);
      return;
    }
    if (!isEnabled(raw, path, options.features, errors)) return;
    const label = readString(raw, "label", path, errors);
    const url = readString(raw, "url", path, errors);
    if (label !== undefined && url !== undefined) endpoints.push({ label, url });
  });
  return endpoints;
}

// ── Invariants ──────────────────────────────────────────────────────────────

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Check the structural invariants of a parsed definition.
 * Returns every violation; an empty list means the definition is usable.
 */
export function validateDefinition(definition: PipelineDefinition): string[] {
  const errors: string[] = [];
  const stageNames = definition.stages.map((s) => s.name);
  const allServices = definition.stages.flatMap((s) => s.steps.map((step) => step.service));

  const supportedStages: readonly string[] = [INFRASTRUCTURE_STAGE, APPLICATION_STAGE];
  for (const name of new Set(stageNames)) {
    if (!supportedStages.includes(name)) {
      errors.push(
        `Stage "${name}" is not supported; stages must be "${INFRASTRUCTURE_STAGE}" or "${APPLICATION_STAGE}"`,
      );
    }
  }
  for (const name of findDuplicates(stageNames)) {
    errors.push(`Stage "${name}" is declared more than once`);
  }
  for (const name of findDuplicates(allServices)) {
    errors.push(`Service "${name}" is declared more than once`);
  }

  // Dependencies must already be declared: earlier stage or earlier in this stage.
  const declared = new Set<string>();
  for (const stage of definition.stages) {
    for (const step of stage.steps) {
      for (const dep of step.dependsOn) {
        if (dep === step.service) {
          errors.push(`Service "${step.service}" depends on itself`);
        } else if (!allServices.includes(dep)) {
          errors.push(`Service "${step.service}" depends on unknown service "${dep}"`);
        } else if (!declared.has(dep)) {
          errors.push(
            `Service "${step.service}" depends on "${dep}", which is not declared before it`,
          );
        }
      }
      declared.add(step.service);
    }
  }

  const infraIndex = stageNames.indexOf(INFRASTRUCTURE_STAGE);
  const appIndex = stageNames.indexOf(APPLICATION_STAGE);
  if (infraIndex === -1) errors.push(`Stage "${INFRASTRUCTURE_STAGE}" is required`);
  if (appIndex === -1) errors.push(`Stage "${APPLICATION_STAGE}" is required`);
  if (infraIndex !== -1 && appIndex !== -1 && infraIndex > appIndex) {
    errors.push(`Stage "${INFRASTRUCTURE_STAGE}" must come before "${APPLICATION_STAGE}"`);
  }

  const execServices = [
    ...definition.stages.flatMap((s) => s.steps.map((step) => step.healthCheck)),
    ...definition.validation.map((t) => t.check),
  ].flatMap((check) => (check.type === "exec" ? [check.service] : []));
  for (const service of new Set(execServices)) {
    if (!allServices.includes(service)) {
      errors.push(`Exec health check targets undeclared service "${service}"`);
    }
  }

  for (const name of findDuplicates(definition.validation.map((t) => t.name))) {
    errors.push(`Validation target "${name}" is declared more than once`);
  }
  for (const name of findDuplicates(definition.apiChecks.map((c) => c.name))) {
    errors.push(`API check "${name}" is declared more than once`);
  }

  return errors;
}

// ── Entry points ────────────────────────────────────────────────────────────

function freezeDefinition(definition: PipelineDefinition): PipelineDefinition {
  return Object.freeze({
    ...definition,
    stages: Object.freeze(
      definition.stages.map((stage) =>
        Object.freeze({ ...stage, steps: Object.freeze(stage.steps.map((s) => Object.freeze(s))) }),
      ),
    ),
    validation: Object.freeze([...definition.validation]),
    apiChecks: Object.freeze([...definition.apiChecks]),
    fixtures: Object.freeze([...definition.fixtures]),
    prerequisites: Object.freeze({ tools: Object.freeze([...definition.prerequisites.tools]) }),
    directories: Object.freeze([...definition.directories]),
    endpoints: Object.freeze([...definition.endpoints]),
  });
}

/**
 * Turn parsed YAML into a validated, frozen definition.
 * @throws DefinitionError listing every shape or invariant violation.
 */
export function parseDefinition(raw: unknown, options: ParseOptions): PipelineDefinition {
  if (!isRecord(raw)) {
    throw new DefinitionError("Invalid pipeline definition: expected a mapping at root", [
      "Root must be a mapping",
    ]);
  }

  const errors: string[] = [];
  const prerequisites = raw["prerequisites"];
  const tools = isRecord(prerequisites)
    ? readStringList(prerequisites["tools"], "prerequisites.tools", errors)
    : [];

  const definition: PipelineDefinition = {
    stages: parseStages(raw, options, errors),
    validation: parseTargets(raw, options, errors),
    apiChecks: parseApiChecks(raw, options, errors),
    fixtures: parseFixtures(raw, options, errors),
    prerequisites: { tools },
    directories: readStringList(raw["directories"], "directories", errors),
    endpoints: parseEndpoints(raw, options, errors),
  };

  if (errors.length > 0) {
    throw new DefinitionError(`Invalid pipeline definition: ${errors.length} error(s)`, errors);
  }

  const violations = validateDefinition(definition);
  if (violations.length > 0) {
    throw new DefinitionError(
      `Invalid pipeline definition: ${violations.length} error(s)`,
      violations,
    );
  }

  return freezeDefinition(definition);
}

/** Read, parse and validate a definition file. */
export async function loadDefinition(
  path: string,
  features: FeatureSet,
): Promise<PipelineDefinition> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err: unknown) {
    throw new DefinitionError(`Failed to read pipeline definition: ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    throw new DefinitionError(`Pipeline definition is not valid YAML: ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  return parseDefinition(raw, { features, baseDir: dirname(path) });
}

// ── Queries ─────────────────────────────────────────────────────────────────

/** Service name → declared dependencies, across every stage. */
export function buildServiceCatalog(
  definition: PipelineDefinition,
): ReadonlyMap<string, readonly string[]> {
  const catalog = new Map<string, readonly string[]>();
  for (const stage of definition.stages) {
    for (const step of stage.steps) catalog.set(step.service, step.dependsOn);
  }
  return catalog;
}

export function findStage(definition: PipelineDefinition, name: string): Stage | undefined {
  return definition.stages.find((stage) => stage.name === name);
}

/** Human-readable plan of what a run would do. */
export function describePlan(definition: PipelineDefinition): string[] {
  const lines: string[] = [];
  for (const stage of definition.stages) {
    lines.push(`Stage ${stage.name}:`);
    for (const step of stage.steps) {
      const deps = step.dependsOn.length > 0 ? ` after ${step.dependsOn.join(", ")}` : "";
      const effort = step.bestEffort ? " (best effort)" : "";
      lines.push(`  - ${step.service} [${step.healthCheck.type}]${deps}${effort}`);
    }
  }
  lines.push("Validation targets:");
  for (const target of definition.validation) {
    lines.push(`  - ${target.name} [${target.check.type}]`);
  }
  if (definition.apiChecks.length > 0) {
    lines.push(`API checks: ${definition.apiChecks.length}`);
  }
  if (definition.fixtures.length > 0) {
    lines.push(`Fixtures: ${definition.fixtures.map((f) => f.name).join(", ")}`);
  }
  return lines;
}
