export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

export class CliHelpRequested extends Error {
  constructor() {
    super("help requested");
    this.name = "CliHelpRequested";
  }
}

/**
 * Every problem found while validating a build template. Problems are
 * collected in one pass so the user sees all of them at once.
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: string[]) {
    super(
      errors.length === 1
        ? `Invalid build configuration: ${errors[0]}`
        : `Invalid build configuration (${errors.length} problems).`,
    );
    this.name = "ConfigurationError";
  }
}

export class DriverUnavailableError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "DriverUnavailableError";
  }
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly output: CommandOutput,
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}

export class ChecksumMismatchError extends Error {
  constructor(
    public readonly source: string,
    public readonly algorithm: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Checksum mismatch for ${source}: expected ${algorithm}:${expected}, got ${algorithm}:${actual}.`);
    this.name = "ChecksumMismatchError";
  }
}

export class StepFailureError extends Error {
  constructor(
    public readonly stepId: string,
    public readonly cause: unknown,
  ) {
    super(`Step '${stepId}' failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "StepFailureError";
  }
}

export class BuildCancelledError extends Error {
  constructor(message = "Build cancelled.") {
    super(message);
    this.name = "BuildCancelledError";
  }
}

export function cancellationError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new BuildCancelledError();
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationError(signal);
  }
}

export function isBuildCancelled(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof BuildCancelledError) {
    return true;
  }

  if (signal?.aborted) {
    return true;
  }

  return error instanceof Error && error.name === "AbortError";
}
