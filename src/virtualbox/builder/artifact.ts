import fs from "node:fs";
import path from "node:path";

import { listDirectorySafely, removePathIfExists } from "../utils/fs";

export const BUILDER_ID = "vbox-build.virtualbox";

/**
 * What a successful build leaves behind: a registered VM whose files live
 * under `outputDir`. The layout below that directory belongs to VirtualBox.
 */
export class VirtualBoxArtifact {
  readonly builderId = BUILDER_ID;

  constructor(
    readonly outputDir: string,
    readonly vmName: string,
    readonly diskPath: string,
  ) {}

  id(): string {
    return this.vmName;
  }

  files(): string[] {
    const files: string[] = [];
    collectFiles(this.outputDir, files);
    return files.sort();
  }

  toString(): string {
    return `VirtualBox VM '${this.vmName}' in ${this.outputDir}`;
  }

  toJSON(): { builderId: string; outputDir: string; vmName: string; diskPath: string } {
    return {
      builderId: this.builderId,
      outputDir: this.outputDir,
      vmName: this.vmName,
      diskPath: this.diskPath,
    };
  }

  async destroy(): Promise<void> {
    await removePathIfExists(this.outputDir);
  }
}

function collectFiles(dirPath: string, into: string[]): void {
  for (const name of listDirectorySafely(dirPath)) {
    const entryPath = path.join(dirPath, name);
    if (fs.lstatSync(entryPath).isDirectory()) {
      collectFiles(entryPath, into);
    } else {
      into.push(entryPath);
    }
  }
}
