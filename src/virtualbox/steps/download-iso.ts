import { fileURLToPath } from "node:url";

import { ChecksumMismatchError } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import { downloadCacheKey, type CacheLease } from "../download/cache";
import { hashFile } from "../download/checksum";
import { downloadToFile, type DownloadProgress } from "../download/fetch";
import type { BuildContext } from "../pipeline/context";
import { CONTINUE, type Step } from "../pipeline/step";
import type { BuildUi } from "../types";

const log = createLogger({ component: "download-iso" });

const PROGRESS_STEP_PERCENT = 10;

export function createDownloadIsoStep(): Step {
  return {
    id: "download-iso",
    description: "Download the installation ISO into the cache (or use the local file) and verify its checksum.",

    async run(context) {
      const { config, ui } = context;

      if (config.isoScheme === "file") {
        // Local media are trusted as-is; see DESIGN.md.
        const isoPath = fileURLToPath(config.isoUrl);
        ui.say(`Using local ISO: ${isoPath}`);
        context.values.set("isoPath", isoPath);
        return CONTINUE;
      }

      ui.say(`Retrieving ISO: ${config.isoUrl}`);
      const key = downloadCacheKey(config.isoUrl, config.isoChecksumType, config.isoChecksum);
      const lease = await context.cache.lock(key, context.signal);

      try {
        const isoPath = await materializeIso(context, lease);
        context.values.set("isoPath", isoPath);
        return CONTINUE;
      } finally {
        await lease.release();
      }
    },
  };
}

async function materializeIso(context: BuildContext, lease: CacheLease): Promise<string> {
  const { config, ui, signal } = context;

  if (lease.isComplete()) {
    ui.message("Found ISO in cache, verifying checksum...");
    const cachedDigest = await hashFile(config.isoChecksumType, lease.path, signal);
    if (cachedDigest === config.isoChecksum) {
      ui.message(`Using cached ISO: ${lease.path}`);
      return lease.path;
    }

    ui.message("Cached ISO does not match the checksum; downloading it again.");
    await lease.discard();
  }

  ui.message(`Downloading ${config.isoUrl}`);

  let digest: string;
  try {
    const result = await downloadToFile({
      url: config.isoUrl,
      destinationPath: lease.partialPath,
      checksumType: config.isoChecksumType,
      signal,
      fetcher: context.fetcher,
      onProgress: createProgressReporter(ui),
    });
    digest = result.digest;
    log.info("download finished", { url: config.isoUrl, bytes: result.bytes });
  } catch (error) {
    await discardPartial(lease);
    throw error;
  }

  if (digest !== config.isoChecksum) {
    await discardPartial(lease);
    throw new ChecksumMismatchError(config.isoUrl, config.isoChecksumType, config.isoChecksum, digest);
  }

  await lease.commit();
  ui.message("Download complete, checksum verified.");
  return lease.path;
}

async function discardPartial(lease: CacheLease): Promise<void> {
  try {
    await lease.discard();
  } catch (error) {
    // The entry is not committed either way; leftovers are overwritten next time.
    log.warn("could not remove partial download", {
      path: lease.partialPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function createProgressReporter(ui: BuildUi): (progress: DownloadProgress) => void {
  let lastReported = 0;

  return ({ receivedBytes, totalBytes }) => {
    if (!totalBytes) {
      return;
    }

    const percent = Math.floor((receivedBytes / totalBytes) * 100);
    if (percent >= lastReported + PROGRESS_STEP_PERCENT) {
      lastReported = percent - (percent % PROGRESS_STEP_PERCENT);
      ui.message(`Download progress: ${lastReported}%`);
    }
  };
}
