import fs from "node:fs";
import path from "node:path";

import { CliUsageError } from "../../shared/cli-errors";
import { isUnwinding } from "../pipeline/context";
import { CONTINUE, halt, type Step } from "../pipeline/step";
import { ensureDirectory, fileExists } from "../utils/fs";

export function createPrepareOutputDirStep(): Step {
  return {
    id: "prepare-output-dir",
    description: "Create the output directory the VM and its disk are written to.",

    async run(context) {
      const { config, ui } = context;
      const outputDir = path.resolve(config.outputDirectory);

      if (fileExists(outputDir)) {
        if (!config.force) {
          return halt(
            new CliUsageError(`Output directory '${outputDir}' already exists.`, [
              "Remove it, choose another output_directory, or pass --force.",
            ]),
          );
        }

        ui.message(`Deleting previous output directory: ${outputDir}`);
        await removeDirectory(outputDir);
      }

      await ensureDirectory(outputDir);
      context.values.set("outputDir", outputDir);
      return CONTINUE;
    },

    async cleanup(context) {
      const outputDir = context.values.get("outputDir");
      if (!outputDir || !isUnwinding(context)) {
        return;
      }

      context.ui.say("Deleting output directory...");
      await removeDirectory(outputDir);
    },
  };
}

async function removeDirectory(dirPath: string): Promise<void> {
  // VirtualBox can hold file handles for a moment after unregistering a VM.
  await fs.promises.rm(dirPath, { recursive: true, force: true, maxRetries: 5, retryDelay: 1000 });
}
