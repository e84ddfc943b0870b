import { describe, expect, it } from "vitest";

import {
  ChecksumMismatchError,
  CommandFailedError,
  ConfigurationError,
  StepFailureError,
} from "../src/shared/cli-errors";
import { createLogger, parseLogLevel, setLogHandler, setLogLevel, type LogEntry } from "../src/shared/log";
import { renderCliError } from "../src/shared/render-cli-error";

describe("renderCliError", () => {
  it("names the failed step and shows the VBoxManage output", () => {
    const cause = new CommandFailedError(
      "VBoxManage createvm exited with status 1.",
      "/usr/bin/VBoxManage createvm --name demo",
      1,
      { stdout: "", stderr: "VBoxManage: error: Machine settings file exists\n" },
    );

    expect(renderCliError(new StepFailureError("create-vm", cause))).toBe(
      [
        "Error: Build failed at step 'create-vm'.",
        "Error: VBoxManage createvm exited with status 1.",
        "  Command: /usr/bin/VBoxManage createvm --name demo",
        "  Exit code: 1",
        "  Stderr:",
        "    VBoxManage: error: Machine settings file exists",
      ].join("\n"),
    );
  });

  it("shows both digests of a checksum mismatch", () => {
    const error = new ChecksumMismatchError("https://example.com/os.iso", "md5", "aa", "bb");

    expect(error.message).toBe("Checksum mismatch for https://example.com/os.iso: expected md5:aa, got md5:bb.");
    expect(renderCliError(error)).toBe(
      [
        "Error: Checksum mismatch for https://example.com/os.iso.",
        "  Expected md5:aa",
        "  Actual   md5:bb",
      ].join("\n"),
    );
  });

  it("summarizes configuration errors", () => {
    expect(new ConfigurationError(["one"]).message).toBe("Invalid build configuration: one");
    expect(new ConfigurationError(["one", "two"]).message).toBe("Invalid build configuration (2 problems).");
  });
});

describe("log", () => {
  it("parses log levels from the environment", () => {
    expect(parseLogLevel(" INFO ")).toBe("info");
    expect(parseLogLevel("1")).toBe("debug");
    expect(parseLogLevel("loud")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });

  it("filters by level and merges child context", () => {
    const entries: LogEntry[] = [];
    const previous = setLogHandler((entry) => entries.push(entry));
    setLogLevel("info");

    try {
      const log = createLogger({ component: "test" }).child({ build: "demo" });
      log.debug("hidden");
      log.info("shown", { step: "create-vm" });
    } finally {
      setLogHandler(previous);
      setLogLevel("warn");
    }

    expect(entries.map(({ level, message, context }) => ({ level, message, context }))).toEqual([
      { level: "info", message: "shown", context: { component: "test", build: "demo", step: "create-vm" } },
    ]);
  });
});
