import fs from "node:fs";
import crypto from "node:crypto";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import { cancellationError, throwIfCancelled } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import type { ChecksumType } from "../types";
import { ensureDirectory, fileExists, removePathIfExists } from "../utils/fs";

const log = createLogger({ component: "download-cache" });

const DEFAULT_POLL_INTERVAL_MS = 500;

/**
 * Exclusive hold on one cache entry. Only the holder may write the entry;
 * other builds asking for the same key wait in `lock` until `release`.
 */
export interface CacheLease {
  readonly key: string;
  /** Where the verified file lives once committed. */
  readonly path: string;
  /** Where an in-flight download is written. Never read as a cache hit. */
  readonly partialPath: string;
  isComplete(): boolean;
  commit(): Promise<void>;
  discard(): Promise<void>;
  release(): Promise<void>;
}

export interface DownloadCache {
  lock(key: string, signal?: AbortSignal): Promise<CacheLease>;
}

export function downloadCacheKey(url: string, checksumType: ChecksumType, checksum: string): string {
  return `${url}#${checksumType}:${checksum.toLowerCase()}`;
}

export interface FileDownloadCacheOptions {
  pollIntervalMs?: number;
  extension?: string;
}

/**
 * Directory-backed cache shared by every build on the host. Keys are hashed
 * into file names. Within a process a keyed queue serializes holders; across
 * processes an exclusively-created `.lock` file does.
 */
export class FileDownloadCache implements DownloadCache {
  private readonly queues = new Map<string, Promise<void>>();
  private readonly pollIntervalMs: number;
  private readonly extension: string;

  constructor(
    public readonly root: string,
    options: FileDownloadCacheOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.extension = options.extension ?? ".iso";
  }

  entryPath(key: string): string {
    const name = crypto.createHash("sha256").update(key).digest("hex");
    return path.join(this.root, `${name}${this.extension}`);
  }

  async lock(key: string, signal?: AbortSignal): Promise<CacheLease> {
    const previous = this.queues.get(key) ?? Promise.resolve();

    let releaseLocal: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      releaseLocal = resolve;
    });
    const tail = previous.then(() => held);
    this.queues.set(key, tail);

    const releaseQueue = (): void => {
      releaseLocal();
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    };

    const entryPath = this.entryPath(key);
    const lockPath = `${entryPath}.lock`;

    try {
      await waitUnlessCancelled(previous, signal);
      await ensureDirectory(this.root);
      await this.acquireLockFile(lockPath, signal);
    } catch (error) {
      releaseQueue();
      throw error;
    }

    log.debug("cache entry locked", { key, entryPath });

    let released = false;
    const partialPath = `${entryPath}.part`;

    return {
      key,
      path: entryPath,
      partialPath,
      isComplete: () => fileExists(entryPath),
      commit: async () => {
        await fs.promises.rename(partialPath, entryPath);
      },
      discard: async () => {
        await removePathIfExists(partialPath);
        await removePathIfExists(entryPath);
      },
      release: async () => {
        if (released) {
          return;
        }
        released = true;

        try {
          await removePathIfExists(lockPath);
        } finally {
          releaseQueue();
          log.debug("cache entry released", { key });
        }
      },
    };
  }

  private async acquireLockFile(lockPath: string, signal?: AbortSignal): Promise<void> {
    while (true) {
      throwIfCancelled(signal);

      try {
        const handle = await fs.promises.open(lockPath, "wx");
        try {
          await handle.writeFile(String(process.pid));
        } finally {
          await handle.close();
        }
        return;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }

      if (await this.isStaleLock(lockPath)) {
        log.warn("breaking stale cache lock", { lockPath });
        await removePathIfExists(lockPath);
        continue;
      }

      try {
        await delay(this.pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw cancellationError(signal);
        }
        throw error;
      }
    }
  }

  private async isStaleLock(lockPath: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(lockPath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        // Holder released between our open and read.
        return false;
      }
      throw error;
    }

    const pid = Number.parseInt(raw.trim(), 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      // Holder has created the file but not written its pid yet.
      return false;
    }

    if (pid === process.pid) {
      // Another cache instance in this process holds it.
      return false;
    }

    try {
      process.kill(pid, 0);
      return false;
    } catch (error) {
      return hasErrorCode(error, "ESRCH");
    }
  }
}

async function waitUnlessCancelled(promise: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    await promise;
    return;
  }

  throwIfCancelled(signal);

  let onAbort: () => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(cancellationError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isAlreadyExists(error: unknown): boolean {
  return hasErrorCode(error, "EEXIST");
}

function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}
