import fs from "node:fs";
import crypto, { type Hash } from "node:crypto";

import type { ChecksumType } from "../types";

const HEX_LENGTHS: Record<ChecksumType, number> = {
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

export const SUPPORTED_CHECKSUM_TYPES: readonly ChecksumType[] = ["md5", "sha1", "sha256", "sha512"];

export function parseChecksumType(value: string): ChecksumType | null {
  const normalized = value.trim().toLowerCase();
  for (const type of SUPPORTED_CHECKSUM_TYPES) {
    if (type === normalized) {
      return type;
    }
  }
  return null;
}

/** Returns a problem description, or null when the hex fits the algorithm. */
export function checkChecksumFormat(type: ChecksumType, hex: string): string | null {
  const expectedLength = HEX_LENGTHS[type];
  if (!/^[a-f0-9]+$/.test(hex)) {
    return `iso_checksum must be hexadecimal, got '${hex}'`;
  }

  if (hex.length !== expectedLength) {
    return `iso_checksum for ${type} must be ${expectedLength} hex characters, got ${hex.length}`;
  }

  return null;
}

export function createChecksumHash(type: ChecksumType): Hash {
  return crypto.createHash(type);
}

export function hashBuffer(type: ChecksumType, buffer: Buffer): string {
  return createChecksumHash(type).update(buffer).digest("hex");
}

export async function hashFile(type: ChecksumType, filePath: string, signal?: AbortSignal): Promise<string> {
  const hash = createChecksumHash(type);
  const stream = fs.createReadStream(filePath, { highWaterMark: 1024 * 1024, signal });

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest("hex");
}
