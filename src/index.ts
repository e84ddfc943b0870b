export { VirtualBoxBuilder, VirtualBoxArtifact, BUILDER_ID, type BuilderOptions } from "./virtualbox/builder";
export { prepareConfig, normalizeIsoUrl } from "./virtualbox/config/prepare";
export { loadTemplate } from "./virtualbox/config/template";
export { FileDownloadCache, downloadCacheKey, type CacheLease, type DownloadCache } from "./virtualbox/download/cache";
export type { Fetcher } from "./virtualbox/download/fetch";
export { createDriver, locateVBoxManage, spawnCommandRunner } from "./virtualbox/driver";
export type { CommandResult, CommandRunner, Driver, StorageController } from "./virtualbox/driver";
export { StepRunner, type RunOutcome } from "./virtualbox/pipeline/runner";
export type { BuildContext, StepValues } from "./virtualbox/pipeline/context";
export type { Step, StepResult } from "./virtualbox/pipeline/step";
export type { BuildConfig, BuildUi, HookEvent, PostStepHook, RawBuildSpec } from "./virtualbox/types";
export * from "./shared/cli-errors";
