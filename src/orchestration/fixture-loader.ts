import { copyFile, mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Logger } from "../observability/logger.ts";
import type { FixtureSpec } from "../types/pipeline.ts";
import type { FixtureLoader, FixtureLoadResult } from "./types.ts";

/**
 * Stages fixture files into the project directories the containers mount
 * (database init scripts, identity realm imports, directory seed data).
 * Contents are copied verbatim.
 */
export class FileFixtureLoader implements FixtureLoader {
  constructor(
    private readonly projectRoot: string,
    private readonly logger: Logger,
  ) {}

  async load(fixtures: readonly FixtureSpec[]): Promise<FixtureLoadResult> {
    const loaded: string[] = [];
    const failed: { name: string; error: string }[] = [];

    for (const fixture of fixtures) {
      const destination = resolve(this.projectRoot, fixture.destination);
      try {
        await mkdir(dirname(destination), { recursive: true });
        await copyFile(fixture.source, destination);
        loaded.push(fixture.name);
        this.logger.debug("Fixture staged", { fixture: fixture.name, destination });
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        failed.push({ name: fixture.name, error });
        this.logger.warn(`Could not stage fixture ${fixture.name}`, { error });
      }
    }

    return { loaded, failed };
  }
}
