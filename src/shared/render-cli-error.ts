import {
  ChecksumMismatchError,
  CliUsageError,
  CommandFailedError,
  ConfigurationError,
  DriverUnavailableError,
  StepFailureError,
} from "./cli-errors";

const MAX_OUTPUT_CHARS = 2000;

export function renderCliError(error: unknown): string {
  if (error instanceof CliUsageError || error instanceof DriverUnavailableError) {
    return withHints(`Error: ${error.message}`, error.hints);
  }

  if (error instanceof ConfigurationError) {
    const lines = ["Error: Invalid build configuration.", ""];
    for (const problem of error.errors) {
      lines.push(`  * ${problem}`);
    }
    return lines.join("\n");
  }

  if (error instanceof StepFailureError) {
    return [`Error: Build failed at step '${error.stepId}'.`, renderCause(error.cause)].join("\n");
  }

  return renderCause(error);
}

function renderCause(error: unknown): string {
  if (error instanceof CommandFailedError) {
    const lines = [
      `Error: ${error.message}`,
      `  Command: ${error.command}`,
      `  Exit code: ${error.exitCode ?? "unknown"}`,
    ];
    appendStream(lines, "Stdout", error.output.stdout);
    appendStream(lines, "Stderr", error.output.stderr);
    return lines.join("\n");
  }

  if (error instanceof ChecksumMismatchError) {
    return [
      `Error: Checksum mismatch for ${error.source}.`,
      `  Expected ${error.algorithm}:${error.expected}`,
      `  Actual   ${error.algorithm}:${error.actual}`,
    ].join("\n");
  }

  if (error instanceof CliUsageError || error instanceof DriverUnavailableError) {
    return withHints(`Error: ${error.message}`, error.hints);
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

function withHints(headline: string, hints: string[]): string {
  const lines = [headline];
  if (hints.length > 0) {
    lines.push("", "How to fix:");
    for (const hint of hints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join("\n");
}

function appendStream(lines: string[], label: string, text: string): void {
  const trimmed = text.trim();
  if (!trimmed) {
    return;
  }

  lines.push(`  ${label}:`);
  const shown = trimmed.length > MAX_OUTPUT_CHARS ? `${trimmed.slice(0, MAX_OUTPUT_CHARS)}...` : trimmed;
  for (const line of shown.split("\n")) {
    lines.push(`    ${line}`);
  }
}
