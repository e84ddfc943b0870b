import type { DownloadCache } from "../download/cache";
import type { Fetcher } from "../download/fetch";
import type { Driver } from "../driver";
import type { BuildConfig, BuildUi, PostStepHook } from "../types";

/** Values produced by steps, keyed by what they hold. Each has one writer. */
export interface StepValues {
  /** Local path of the verified ISO (download-iso). */
  isoPath: string;
  /** Absolute output directory (prepare-output-dir). */
  outputDir: string;
  /** Name of the registered VM (create-vm). */
  vmName: string;
  /** Disk image created but possibly not yet attached (create-disk). */
  createdDisk: string;
  /** Path of the VM's hard disk image, once attached (create-disk). */
  diskPath: string;
  /** Medium currently in the VM's DVD drive (attach-iso). */
  attachedMedium: string;
}

export type RunState = "running" | "completed" | "halted" | "cancelled";

export class StepValueStore {
  private readonly values: Partial<StepValues> = {};

  set<K extends keyof StepValues>(key: K, value: StepValues[K]): void {
    if (this.values[key] !== undefined) {
      throw new Error(`Build context value '${key}' was already written.`);
    }
    this.values[key] = value;
  }

  get<K extends keyof StepValues>(key: K): StepValues[K] | undefined {
    return this.values[key];
  }

  require<K extends keyof StepValues>(key: K): StepValues[K] {
    const value = this.values[key];
    if (value === undefined) {
      throw new Error(`Build context value '${key}' is not available; the step producing it has not run.`);
    }
    return value;
  }

  has(key: keyof StepValues): boolean {
    return this.values[key] !== undefined;
  }
}

/**
 * Everything a step can see. Collaborators are fixed for the run; step
 * outputs go through `values`, which refuses a second write to a key.
 */
export interface BuildContext {
  readonly config: BuildConfig;
  readonly driver: Driver;
  readonly cache: DownloadCache;
  readonly ui: BuildUi;
  readonly hook: PostStepHook;
  readonly fetcher?: Fetcher;
  readonly signal: AbortSignal;
  readonly values: StepValueStore;
  /** Read by cleanups to decide whether to undo their work. */
  state: RunState;
}

export interface CreateContextOptions {
  config: BuildConfig;
  driver: Driver;
  cache: DownloadCache;
  ui: BuildUi;
  hook: PostStepHook;
  signal: AbortSignal;
  fetcher?: Fetcher;
}

export function createBuildContext(options: CreateContextOptions): BuildContext {
  return {
    ...options,
    values: new StepValueStore(),
    state: "running",
  };
}

/** True once the run is going to end without an artifact. */
export function isUnwinding(context: BuildContext): boolean {
  return context.state === "halted" || context.state === "cancelled";
}
