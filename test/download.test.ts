import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { ChecksumMismatchError, CliUsageError } from "../src/shared/cli-errors";
import { prepareConfig } from "../src/virtualbox/config/prepare";
import { FileDownloadCache, downloadCacheKey } from "../src/virtualbox/download/cache";
import { hashBuffer, hashFile } from "../src/virtualbox/download/checksum";
import { downloadToFile, type Fetcher } from "../src/virtualbox/download/fetch";
import { createDriver } from "../src/virtualbox/driver";
import { createBuildContext } from "../src/virtualbox/pipeline/context";
import { createDownloadIsoStep } from "../src/virtualbox/steps/download-iso";
import {
  FAKE_VBOXMANAGE,
  createBytesFetcher,
  createFakeVBoxManage,
  createRecordingUi,
  makeTempDir,
} from "./helpers/fakes";

const ISO_BYTES = Buffer.from("pretend this is a bootable installer image");
const ISO_URL = "https://mirror.example.com/os.iso";

describe("downloadToFile", () => {
  it("writes the body and returns the digest of what was written", async () => {
    const dir = makeTempDir();
    const destinationPath = path.join(dir, "nested", "os.iso");
    const { fetcher, requests } = createBytesFetcher(ISO_BYTES, 5);
    const progress: number[] = [];

    const result = await downloadToFile({
      url: ISO_URL,
      destinationPath,
      checksumType: "sha256",
      signal: new AbortController().signal,
      fetcher,
      onProgress: ({ receivedBytes }) => progress.push(receivedBytes),
    });

    expect(requests).toEqual([ISO_URL]);
    expect(result).toEqual({ digest: hashBuffer("sha256", ISO_BYTES), bytes: ISO_BYTES.length });
    expect(fs.readFileSync(destinationPath)).toEqual(ISO_BYTES);
    expect(await hashFile("sha256", destinationPath)).toBe(result.digest);
    expect(progress.at(-1)).toBe(ISO_BYTES.length);
  });

  it.runIf(fs.existsSync("/dev/full"))("cancels the response body when the file cannot be written", async () => {
    const cancelReasons: unknown[] = [];
    const fetcher: Fetcher = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          pull(controller) {
            controller.enqueue(new Uint8Array(ISO_BYTES));
          },
          cancel(reason) {
            cancelReasons.push(reason);
          },
        }),
        { status: 200 },
      );

    const error = await downloadToFile({
      url: ISO_URL,
      // Every write to /dev/full fails with ENOSPC.
      destinationPath: "/dev/full",
      checksumType: "md5",
      signal: new AbortController().signal,
      fetcher,
    }).then(() => null, (reason: unknown) => reason);

    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error && "code" in error ? error.code : undefined).toBe("ENOSPC");
    expect(cancelReasons).toEqual([error]);
  });

  it("turns an HTTP error status into a usage error", async () => {
    const dir = makeTempDir();
    const fetcher: Fetcher = async () => new Response("gone", { status: 404, statusText: "Not Found" });

    await expect(
      downloadToFile({
        url: ISO_URL,
        destinationPath: path.join(dir, "os.iso"),
        checksumType: "md5",
        signal: new AbortController().signal,
        fetcher,
      }),
    ).rejects.toThrow(new CliUsageError(`Download of ${ISO_URL} failed with HTTP 404 Not Found.`));
  });
});

describe("FileDownloadCache", () => {
  it("commits a partial download into the entry", async () => {
    const cache = new FileDownloadCache(makeTempDir());
    const lease = await cache.lock("key-a");

    expect(lease.isComplete()).toBe(false);
    expect(fs.existsSync(`${lease.path}.lock`)).toBe(true);

    fs.writeFileSync(lease.partialPath, "data");
    await lease.commit();
    await lease.release();

    expect(lease.isComplete()).toBe(true);
    expect(fs.existsSync(lease.partialPath)).toBe(false);
    expect(fs.existsSync(`${lease.path}.lock`)).toBe(false);
    expect(lease.path.endsWith(".iso")).toBe(true);
  });

  it("discards both the partial file and the entry", async () => {
    const cache = new FileDownloadCache(makeTempDir());
    const lease = await cache.lock("key-b");
    fs.writeFileSync(lease.path, "stale");
    fs.writeFileSync(lease.partialPath, "half");

    await lease.discard();
    await lease.release();

    expect(fs.existsSync(lease.path)).toBe(false);
    expect(fs.existsSync(lease.partialPath)).toBe(false);
  });

  it("hands out one lease per key at a time", async () => {
    const cache = new FileDownloadCache(makeTempDir(), { pollIntervalMs: 10 });
    const order: string[] = [];

    const first = await cache.lock("shared");
    const secondPending = cache.lock("shared").then((lease) => {
      order.push("second acquired");
      return lease;
    });

    await new Promise((resolve) => setTimeout(resolve, 30));
    order.push("first releasing");
    await first.release();

    const second = await secondPending;
    await second.release();

    expect(order).toEqual(["first releasing", "second acquired"]);
  });

  it("stops waiting when cancelled", async () => {
    const cache = new FileDownloadCache(makeTempDir(), { pollIntervalMs: 10 });
    const holder = await cache.lock("busy");
    const controller = new AbortController();

    const waiting = cache.lock("busy", controller.signal);
    controller.abort(new Error("stop"));

    await expect(waiting).rejects.toThrow("stop");
    await holder.release();
  });

  it("breaks a lock left by a process that no longer exists", async () => {
    const cache = new FileDownloadCache(makeTempDir(), { pollIntervalMs: 10 });
    const key = "orphaned";
    fs.mkdirSync(cache.root, { recursive: true });
    // PIDs above the kernel's pid_max cannot be live.
    fs.writeFileSync(`${cache.entryPath(key)}.lock`, "99999999");

    const lease = await cache.lock(key);
    expect(fs.readFileSync(`${lease.path}.lock`, "utf8")).toBe(String(process.pid));
    await lease.release();
  });

  it("builds keys from the URL and the lower-cased checksum", () => {
    expect(downloadCacheKey(ISO_URL, "md5", "ABC")).toBe(`${ISO_URL}#md5:abc`);
  });
});

async function downloadStepContext(cache: FileDownloadCache, fetcher: Fetcher, checksum: string) {
  const ui = createRecordingUi();
  const driver = await createDriver(FAKE_VBOXMANAGE, createFakeVBoxManage().runner);
  const { config, errors } = prepareConfig({
    iso_url: ISO_URL,
    iso_checksum: checksum,
    iso_checksum_type: "sha256",
  });
  expect(errors).toEqual([]);

  const context = createBuildContext({
    config,
    driver,
    cache,
    ui,
    hook: async () => undefined,
    signal: new AbortController().signal,
    fetcher,
  });
  return { context, ui };
}

describe("download-iso step", () => {
  it("downloads once when two builds want the same ISO at the same time", async () => {
    const cache = new FileDownloadCache(makeTempDir(), { pollIntervalMs: 10 });
    const { fetcher, requests } = createBytesFetcher(ISO_BYTES);
    const checksum = hashBuffer("sha256", ISO_BYTES);
    const step = createDownloadIsoStep();

    const first = await downloadStepContext(cache, fetcher, checksum);
    const second = await downloadStepContext(cache, fetcher, checksum);

    const results = await Promise.all([step.run(first.context), step.run(second.context)]);

    expect(results).toEqual([{ action: "continue" }, { action: "continue" }]);
    expect(requests).toEqual([ISO_URL]);

    const isoPath = first.context.values.require("isoPath");
    expect(second.context.values.require("isoPath")).toBe(isoPath);
    expect(fs.readFileSync(isoPath)).toEqual(ISO_BYTES);
    expect(second.ui.lines).toContain(`message: Using cached ISO: ${isoPath}`);
  });

  it("never commits a download whose checksum does not match", async () => {
    const cache = new FileDownloadCache(makeTempDir());
    const { fetcher } = createBytesFetcher(ISO_BYTES);
    const wrong = "f".repeat(64);
    const { context } = await downloadStepContext(cache, fetcher, wrong);

    const error = await createDownloadIsoStep()
      .run(context)
      .then(() => null, (reason: unknown) => reason);

    expect(error).toBeInstanceOf(ChecksumMismatchError);
    if (error instanceof ChecksumMismatchError) {
      expect(error.expected).toBe(wrong);
      expect(error.actual).toBe(hashBuffer("sha256", ISO_BYTES));
    }

    const entryPath = cache.entryPath(downloadCacheKey(ISO_URL, "sha256", wrong));
    expect(fs.existsSync(entryPath)).toBe(false);
    expect(fs.existsSync(`${entryPath}.part`)).toBe(false);
    expect(fs.existsSync(`${entryPath}.lock`)).toBe(false);
    expect(context.values.has("isoPath")).toBe(false);
  });

  it("downloads again when the cached entry no longer matches", async () => {
    const cache = new FileDownloadCache(makeTempDir());
    const { fetcher, requests } = createBytesFetcher(ISO_BYTES);
    const checksum = hashBuffer("sha256", ISO_BYTES);
    const entryPath = cache.entryPath(downloadCacheKey(ISO_URL, "sha256", checksum));
    fs.mkdirSync(cache.root, { recursive: true });
    fs.writeFileSync(entryPath, "corrupted");

    const { context, ui } = await downloadStepContext(cache, fetcher, checksum);
    await createDownloadIsoStep().run(context);

    expect(requests).toEqual([ISO_URL]);
    expect(fs.readFileSync(entryPath)).toEqual(ISO_BYTES);
    expect(ui.lines).toContain("message: Cached ISO does not match the checksum; downloading it again.");
  });
});
