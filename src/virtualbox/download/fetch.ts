import fs from "node:fs";
import path from "node:path";

import { CliUsageError, cancellationError, throwIfCancelled } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import type { ChecksumType } from "../types";
import { createChecksumHash } from "./checksum";

const log = createLogger({ component: "download" });

export type Fetcher = (url: string, init: { signal: AbortSignal; redirect: "follow" }) => Promise<Response>;

export interface DownloadProgress {
  receivedBytes: number;
  totalBytes: number | null;
}

export interface DownloadToFileOptions {
  url: string;
  destinationPath: string;
  checksumType: ChecksumType;
  signal: AbortSignal;
  fetcher?: Fetcher;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface DownloadResult {
  /** Lower-cased hex digest of exactly the bytes written to disk. */
  digest: string;
  bytes: number;
}

/**
 * Streams `url` into `destinationPath`. Each chunk is hashed and written in
 * the same iteration, so the digest always describes the file on disk.
 */
export async function downloadToFile(options: DownloadToFileOptions): Promise<DownloadResult> {
  const { url, destinationPath, signal } = options;
  const fetcher: Fetcher = options.fetcher ?? fetch;

  throwIfCancelled(signal);

  let response: Response;
  try {
    response = await fetcher(url, { signal, redirect: "follow" });
  } catch (error) {
    if (signal.aborted) {
      throw cancellationError(signal);
    }
    throw new CliUsageError(`Failed to download ${url}.`, [
      error instanceof Error ? error.message : String(error),
      "Check network access to the ISO host, or point iso_url at a local file.",
    ]);
  }

  if (!response.ok) {
    throw new CliUsageError(`Download of ${url} failed with HTTP ${response.status} ${response.statusText}.`, [
      "Verify that iso_url is reachable and points at the ISO itself.",
    ]);
  }

  if (!response.body) {
    throw new CliUsageError(`Download of ${url} returned no body.`, []);
  }

  const totalBytes = parseContentLength(response.headers.get("content-length"));
  const hash = createChecksumHash(options.checksumType);

  await fs.promises.mkdir(path.dirname(destinationPath), { recursive: true });
  const handle = await fs.promises.open(destinationPath, "w");
  const reader = response.body.getReader();
  let receivedBytes = 0;

  try {
    while (true) {
      // The signal was handed to the fetcher too, so aborting also tears down the body stream.
      throwIfCancelled(signal);

      const chunk = await readChunk(reader, signal);
      if (!chunk) {
        break;
      }

      hash.update(chunk);
      await handle.write(chunk);
      receivedBytes += chunk.byteLength;
      options.onProgress?.({ receivedBytes, totalBytes });
    }
  } catch (error) {
    await cancelBody(reader, error);
    throw error;
  } finally {
    reader.releaseLock();
    await handle.close();
  }

  return {
    digest: hash.digest("hex").toLowerCase(),
    bytes: receivedBytes,
  };
}

type ChunkReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
};

/** Releases the connection behind a body that will not be read to the end. */
async function cancelBody(reader: ChunkReader, reason: unknown): Promise<void> {
  try {
    await reader.cancel(reason);
  } catch (error) {
    // An already-errored stream rejects the cancel with its own error.
    log.debug("response body cancel failed", { error: error instanceof Error ? error.message : String(error) });
  }
}

async function readChunk(reader: ChunkReader, signal: AbortSignal): Promise<Uint8Array | null> {
  try {
    const { done, value } = await reader.read();
    return done || !value ? null : value;
  } catch (error) {
    if (signal.aborted) {
      throw cancellationError(signal);
    }
    throw error;
  }
}

function parseContentLength(value: string | null): number | null {
  if (!value) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}
