import fs from "node:fs";
import path from "node:path";

import { DriverUnavailableError } from "../../shared/cli-errors";

const BINARY_NAME = process.platform === "win32" ? "VBoxManage.exe" : "VBoxManage";

const INSTALL_DIR_CANDIDATES = [
  "/usr/bin",
  "/usr/local/bin",
  "/opt/VirtualBox",
  "/Applications/VirtualBox.app/Contents/MacOS",
];

export interface LocateOptions {
  /** Path given on the command line; wins over everything else. */
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Finds the VBoxManage binary. Called once per build, at the edge; the result
 * is handed to the driver instead of being looked up again later.
 */
export function locateVBoxManage(options: LocateOptions = {}): string {
  const env = options.env ?? process.env;

  const configured = options.explicitPath ?? nonEmpty(env.VBOX_BUILD_VBOXMANAGE);
  if (configured) {
    const resolved = path.resolve(configured);
    if (!isExecutableFile(resolved)) {
      throw new DriverUnavailableError(`VBoxManage not found at ${resolved}.`, [
        "Point --vboxmanage (or VBOX_BUILD_VBOXMANAGE) at the VBoxManage executable.",
      ]);
    }
    return resolved;
  }

  for (const dir of searchDirectories(env)) {
    const candidate = path.join(dir, BINARY_NAME);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  throw new DriverUnavailableError("Required command 'VBoxManage' was not found.", [
    "Install VirtualBox from https://www.virtualbox.org/wiki/Downloads.",
    "If installed but not on PATH, pass --vboxmanage /path/to/VBoxManage.",
  ]);
}

function searchDirectories(env: NodeJS.ProcessEnv): string[] {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0);

  // The Windows installer exports its location instead of touching PATH.
  for (const variable of [env.VBOX_INSTALL_PATH, env.VBOX_MSI_INSTALL_PATH]) {
    const value = nonEmpty(variable);
    if (value) {
      dirs.push(...value.split(path.delimiter));
    }
  }

  dirs.push(...INSTALL_DIR_CANDIDATES);
  return dirs;
}

function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}
