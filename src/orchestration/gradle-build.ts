import type { Logger } from "../observability/logger.ts";
import {
  commandSucceeded,
  describeFailure,
  type BuildOptions,
  type BuildResult,
  type BuildTool,
  type CommandOutcome,
  type CommandRunner,
  type StackOperations,
} from "./types.ts";

export interface GradleComposeBuildConfig {
  readonly projectRoot: string;
  readonly gradleCommand: string;
  readonly timeoutMs: number;
}

export const DEFAULT_GRADLE_BUILD_CONFIG: Omit<GradleComposeBuildConfig, "projectRoot"> = {
  gradleCommand: "./gradlew",
  timeoutMs: 30 * 60_000,
};

/**
 * Compiles the application with the Gradle wrapper (tests excluded), then
 * builds the container images.
 */
export class GradleComposeBuild implements BuildTool {
  constructor(
    private readonly commands: CommandRunner,
    private readonly stack: Pick<StackOperations, "buildImages">,
    private readonly config: GradleComposeBuildConfig,
    private readonly logger: Logger,
  ) {}

  async build(options: BuildOptions): Promise<BuildResult> {
    const startedAt = Date.now();
    const steps: CommandOutcome[] = [];

    this.logger.info("Building application artifacts");
    const gradle = await this.commands.run(
      this.config.gradleCommand,
      [
        "clean",
        "build",
        "-x",
        "test",
        ...(options.parallel ? ["--parallel"] : []),
        "--build-cache",
      ],
      { cwd: this.config.projectRoot, timeoutMs: this.config.timeoutMs, signal: options.signal },
    );
    steps.push(gradle);

    if (!commandSucceeded(gradle)) {
      return {
        status: "failed",
        steps,
        durationMs: Date.now() - startedAt,
        error: `application build failed: ${describeFailure(gradle)}`,
      };
    }

    this.logger.info("Building container images", { noCache: options.forceRebuild });
    const images = await this.stack.buildImages({
      noCache: options.forceRebuild,
      signal: options.signal,
    });
    steps.push(images);

    if (!commandSucceeded(images)) {
      return {
        status: "failed",
        steps,
        durationMs: Date.now() - startedAt,
        error: `image build failed: ${describeFailure(images)}`,
      };
    }

    return { status: "succeeded", steps, durationMs: Date.now() - startedAt };
  }
}
