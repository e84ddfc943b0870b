import path from "node:path";

import { CliHelpRequested, CliUsageError } from "../../shared/cli-errors";
import type { BuilderCliOptions } from "../types";

type RawArgs = {
  template?: string;
  cacheDir?: string;
  vboxManage?: string;
  force: boolean;
  dryRun: boolean;
};

type ValueKey = "template" | "cacheDir" | "vboxManage";

const VALUE_FLAGS = new Map<string, ValueKey>([
  ["--template", "template"],
  ["--cache-dir", "cacheDir"],
  ["--vboxmanage", "vboxManage"],
]);

function splitLongOption(token: string): { flag: string; inlineValue: string | undefined } {
  if (!token.startsWith("--")) {
    return { flag: token, inlineValue: undefined };
  }

  const equalsIndex = token.indexOf("=");
  if (equalsIndex === -1) {
    return { flag: token, inlineValue: undefined };
  }

  return {
    flag: token.slice(0, equalsIndex),
    inlineValue: token.slice(equalsIndex + 1),
  };
}

function readValue(
  argv: string[],
  index: number,
  flag: string,
  inlineValue: string | undefined
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined) {
    if (inlineValue.trim().length === 0) {
      throw new CliUsageError(`${flag} cannot be empty.`, [`Provide a non-empty value for ${flag}.`]);
    }

    return {
      value: inlineValue,
      nextIndex: index,
    };
  }

  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value.`, [`Example: ${flag} <value>`]);
  }

  return {
    value,
    nextIndex: index + 1,
  };
}

function setOnce(raw: RawArgs, key: ValueKey, value: string, flag: string): void {
  const existing = raw[key];
  if (existing !== undefined) {
    throw new CliUsageError(`${flag} was provided more than once.`, [
      `Pass ${flag} only once. Received '${existing}' and '${value}'.`,
    ]);
  }

  raw[key] = value;
}

function assertNoValue(flag: string, inlineValue: string | undefined): void {
  if (inlineValue !== undefined) {
    throw new CliUsageError(`${flag} does not accept a value.`, [`Use ${flag} as a standalone flag.`]);
  }
}

export function parseVboxBuildArgs(argv: string[]): BuilderCliOptions {
  const raw: RawArgs = {
    force: false,
    dryRun: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const { flag, inlineValue } = splitLongOption(token);

    if (flag === "--help" || flag === "-h") {
      throw new CliHelpRequested();
    }

    if (flag === "--force") {
      assertNoValue(flag, inlineValue);
      raw.force = true;
      continue;
    }

    if (flag === "--dry-run") {
      assertNoValue(flag, inlineValue);
      raw.dryRun = true;
      continue;
    }

    const key = VALUE_FLAGS.get(flag);
    if (key) {
      const result = readValue(argv, i, flag, inlineValue);
      setOnce(raw, key, result.value, flag);
      i = result.nextIndex;
      continue;
    }

    if (token.startsWith("-")) {
      throw new CliUsageError(`Unknown option '${token}'.`, [
        "Run vbox-build --help to see supported options.",
      ]);
    }

    throw new CliUsageError(`Unexpected positional argument '${token}'.`, [
      "Pass the template with --template.",
      `Example: vbox-build --template ${token}`,
    ]);
  }

  if (!raw.template) {
    throw new CliUsageError("Missing required --template option.", [
      "Specify the build template to run.",
      "Example: --template ./ubuntu.json",
    ]);
  }

  return {
    templatePath: path.resolve(raw.template),
    cacheDir: raw.cacheDir ? path.resolve(raw.cacheDir) : undefined,
    vboxManagePath: raw.vboxManage ? path.resolve(raw.vboxManage) : undefined,
    force: raw.force,
    dryRun: raw.dryRun,
  };
}
