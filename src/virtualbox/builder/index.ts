import { ConfigurationError, DriverUnavailableError } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import { prepareConfig } from "../config/prepare";
import type { DownloadCache } from "../download/cache";
import type { Fetcher } from "../download/fetch";
import { createDriver, locateVBoxManage, spawnCommandRunner, type CommandRunner, type Driver } from "../driver";
import type { LocateOptions } from "../driver/locate";
import { createBuildContext } from "../pipeline/context";
import { StepRunner } from "../pipeline/runner";
import type { Step } from "../pipeline/step";
import { createBuildSteps } from "../steps";
import type { BuildConfig, BuildDryRunPlan, BuildUi, PostStepHook } from "../types";
import { VirtualBoxArtifact } from "./artifact";

export { BUILDER_ID, VirtualBoxArtifact } from "./artifact";

const log = createLogger({ component: "builder" });

export interface BuilderOptions {
  /** Overrides VBoxManage discovery. */
  vboxManagePath?: string;
  /** Directory that relative local iso_url paths resolve against. */
  baseDir?: string;
  /** Replace an existing output directory instead of failing. */
  force?: boolean;
  env?: NodeJS.ProcessEnv;
  commandRunner?: CommandRunner;
  locateTool?: (options: LocateOptions) => string;
  fetcher?: Fetcher;
}

type BuilderState = "idle" | "running" | "finished";

/**
 * Host-facing surface of the VirtualBox builder: validate a template once,
 * then run the provisioning pipeline, and cancel it from outside if needed.
 */
export class VirtualBoxBuilder {
  private readonly steps: Step[] = createBuildSteps();
  private config: BuildConfig | null = null;
  private driver: Driver | null = null;
  private runner: StepRunner | null = null;
  private state: BuilderState = "idle";
  private cancelRequested = false;

  constructor(private readonly options: BuilderOptions = {}) {}

  /**
   * Validates the template and sets up the driver. Throws one
   * ConfigurationError listing every problem, driver problems included.
   */
  async prepare(raw: unknown): Promise<BuildConfig> {
    const { config, errors } = prepareConfig(raw, {
      baseDir: this.options.baseDir,
      force: this.options.force,
    });

    let driver: Driver | null = null;
    try {
      const locate = this.options.locateTool ?? locateVBoxManage;
      const toolPath = locate({ explicitPath: this.options.vboxManagePath, env: this.options.env });
      log.info("using VBoxManage", { toolPath });
      driver = await createDriver(toolPath, this.options.commandRunner ?? spawnCommandRunner);
    } catch (error) {
      errors.push(`Failed creating VirtualBox driver: ${describeDriverError(error)}`);
    }

    if (errors.length > 0 || !driver) {
      throw new ConfigurationError(errors);
    }

    this.config = config;
    this.driver = driver;
    return config;
  }

  /**
   * Resolves the artifact on success and null when cancelled; rejects with
   * the StepFailureError of the step that failed without reporting it to `ui`.
   */
  async run(ui: BuildUi, hook: PostStepHook, cache: DownloadCache): Promise<VirtualBoxArtifact | null> {
    if (!this.config || !this.driver) {
      throw new Error("prepare() must succeed before run().");
    }

    if (this.state === "running") {
      throw new Error("A build is already running on this builder.");
    }

    const runner = new StepRunner();
    this.runner = runner;
    this.state = "running";

    if (this.cancelRequested) {
      runner.cancel();
    }

    const context = createBuildContext({
      config: this.config,
      driver: this.driver,
      cache,
      ui,
      hook,
      signal: runner.signal,
      fetcher: this.options.fetcher,
    });

    try {
      const outcome = await runner.run(this.steps, context);

      switch (outcome.status) {
        case "completed":
          return new VirtualBoxArtifact(
            context.values.require("outputDir"),
            context.values.require("vmName"),
            context.values.require("diskPath"),
          );
        case "cancelled":
          ui.error("Build was cancelled.");
          return null;
        case "failed":
          // Reported by the caller, which can render the cause in full.
          throw outcome.error;
      }
    } finally {
      this.state = "finished";
      this.cancelRequested = false;
    }
  }

  /** Safe to call any number of times, before, during or after `run`. */
  cancel(): void {
    if (this.state === "running" && this.runner) {
      log.info("cancelling build");
      this.runner.cancel();
      return;
    }

    if (this.state === "idle") {
      this.cancelRequested = true;
    }
  }

  plan(): BuildDryRunPlan {
    if (!this.config) {
      throw new Error("prepare() must succeed before plan().");
    }

    return {
      command: "vbox-build",
      dryRun: true,
      config: this.config,
      steps: this.steps.map((step) => ({ id: step.id, description: step.description })),
    };
  }
}

function describeDriverError(error: unknown): string {
  if (error instanceof DriverUnavailableError && error.hints.length > 0) {
    return `${error.message} ${error.hints.join(" ")}`;
  }

  return error instanceof Error ? error.message : String(error);
}
