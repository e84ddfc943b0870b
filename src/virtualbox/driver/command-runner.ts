import { spawn } from "node:child_process";

import { cancellationError } from "../../shared/cli-errors";

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  /** Aborting kills the child process. */
  signal?: AbortSignal;
}

/**
 * Runs an external program to completion. Resolves with whatever the program
 * printed, whatever its exit code; rejects only when it could not be started
 * or was cancelled.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandRunOptions,
) => Promise<CommandResult>;

export const spawnCommandRunner: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const { signal } = options;
    let settled = false;
    let stdout = "";
    let stderr = "";

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
      signal,
    });

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr.on("data", (data: string) => {
      stderr += data;
    });

    child.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;

      if (signal?.aborted) {
        reject(cancellationError(signal));
        return;
      }
      reject(error);
    });

    child.on("close", (code) => {
      if (settled) {
        return;
      }
      settled = true;

      if (signal?.aborted) {
        reject(cancellationError(signal));
        return;
      }
      resolve({ exitCode: code, stdout, stderr });
    });
  });

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map(quoteArgument).join(" ");
}

function quoteArgument(value: string): string {
  if (value.length > 0 && /^[\w@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}
