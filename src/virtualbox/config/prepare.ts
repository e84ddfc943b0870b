import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import { SUPPORTED_CHECKSUM_TYPES, checkChecksumFormat, parseChecksumType } from "../download/checksum";
import type { BuildConfig, ChecksumType, HardDriveInterface, IsoScheme, RawBuildSpec } from "../types";
import { isRegularFile } from "../utils/fs";

export const DEFAULT_GUEST_OS_TYPE = "Other";
export const DEFAULT_OUTPUT_DIRECTORY = "virtualbox";
export const DEFAULT_VM_NAME = "packer";
export const DEFAULT_CHECKSUM_TYPE: ChecksumType = "md5";
export const DEFAULT_DISK_SIZE_MB = 40000;
export const DEFAULT_HARD_DRIVE_INTERFACE: HardDriveInterface = "ide";

const KNOWN_KEYS: ReadonlySet<string> = new Set<keyof RawBuildSpec>([
  "guest_os_type",
  "output_directory",
  "vm_name",
  "iso_url",
  "iso_checksum",
  "iso_checksum_type",
  "disk_size",
  "hard_drive_interface",
]);

const SUPPORTED_SCHEMES: readonly IsoScheme[] = ["file", "http", "https"];

export interface PrepareConfigOptions {
  /** Relative local iso_url values resolve against this directory. */
  baseDir?: string;
  force?: boolean;
}

export interface PreparedConfig {
  config: BuildConfig;
  /** Every problem found; empty when the config is usable. */
  errors: string[];
}

/**
 * Applies defaults to a raw template and validates it. Never stops at the
 * first problem: the caller gets all of them together.
 */
export function prepareConfig(raw: unknown, options: PrepareConfigOptions = {}): PreparedConfig {
  const errors: string[] = [];
  const settings: Record<string, unknown> = isPlainObject(raw) ? raw : {};

  if (!isPlainObject(raw)) {
    errors.push("The build template must be an object of builder settings.");
  }

  for (const key of Object.keys(settings)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push(`Unknown configuration key: '${key}'.`);
    }
  }

  const guestOsType = readString(settings, "guest_os_type", errors) || DEFAULT_GUEST_OS_TYPE;
  const outputDirectory = readString(settings, "output_directory", errors) || DEFAULT_OUTPUT_DIRECTORY;
  const vmName = readString(settings, "vm_name", errors) || DEFAULT_VM_NAME;

  const rawChecksumType = readString(settings, "iso_checksum_type", errors) || DEFAULT_CHECKSUM_TYPE;
  const parsedChecksumType = parseChecksumType(rawChecksumType);
  if (!parsedChecksumType) {
    errors.push(
      `Unsupported iso_checksum_type '${rawChecksumType}'. Supported types: ${SUPPORTED_CHECKSUM_TYPES.join(", ")}.`,
    );
  }
  const isoChecksumType = parsedChecksumType ?? DEFAULT_CHECKSUM_TYPE;

  let isoChecksum = readString(settings, "iso_checksum", errors);
  if (!isoChecksum) {
    errors.push("Due to large file sizes, an iso_checksum is required.");
  } else {
    isoChecksum = isoChecksum.toLowerCase();
    const formatProblem = parsedChecksumType ? checkChecksumFormat(parsedChecksumType, isoChecksum) : null;
    if (formatProblem) {
      errors.push(`${formatProblem}.`);
    }
  }

  const diskSize = readPositiveInteger(settings, "disk_size", errors) ?? DEFAULT_DISK_SIZE_MB;
  const hardDriveInterface = readHardDriveInterface(settings, errors);

  const iso = normalizeIsoUrl(readString(settings, "iso_url", errors), options.baseDir ?? process.cwd(), errors);

  return {
    config: {
      guestOsType,
      outputDirectory,
      vmName,
      isoUrl: iso?.url ?? "",
      isoScheme: iso?.scheme ?? "file",
      isoChecksum,
      isoChecksumType,
      diskSize,
      hardDriveInterface,
      force: options.force ?? false,
    },
    errors,
  };
}

export interface NormalizedIsoUrl {
  url: string;
  scheme: IsoScheme;
}

/**
 * Canonicalizes iso_url. A bare path becomes a file: URL; the result is the
 * URL's serialized form, so equivalent spellings produce one cache key.
 */
export function normalizeIsoUrl(value: string, baseDir: string, errors: string[]): NormalizedIsoUrl | null {
  if (!value) {
    errors.push("An iso_url must be specified.");
    return null;
  }

  let url: URL;
  if (hasUrlScheme(value)) {
    try {
      url = new URL(value);
    } catch (error) {
      errors.push(`iso_url is not a valid URL: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  } else {
    url = pathToFileURL(path.resolve(baseDir, value));
  }

  const scheme = url.protocol.replace(/:$/, "").toLowerCase();
  if (scheme === "file") {
    let filePath: string;
    try {
      filePath = fileURLToPath(url);
    } catch (error) {
      errors.push(`iso_url is not a usable file URL: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    if (!isRegularFile(filePath)) {
      errors.push(`iso_url points to bad file: ${filePath} does not exist or is not a regular file.`);
      return null;
    }

    return { url: url.href, scheme: "file" };
  }

  const supported = SUPPORTED_SCHEMES.find((candidate) => candidate === scheme);
  if (!supported) {
    errors.push(`Unsupported URL scheme in iso_url: ${scheme}`);
    return null;
  }

  return { url: url.href, scheme: supported };
}

function hasUrlScheme(value: string): boolean {
  // C:\images\os.iso is a Windows path, not a URL with scheme "c".
  if (/^[a-zA-Z]:[\\/]/.test(value)) {
    return false;
  }

  return /^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(settings: Record<string, unknown>, key: keyof RawBuildSpec, errors: string[]): string {
  const value = settings[key];
  if (value === undefined || value === null) {
    return "";
  }

  if (typeof value !== "string") {
    errors.push(`${key} must be a string.`);
    return "";
  }

  return value.trim();
}

function readPositiveInteger(
  settings: Record<string, unknown>,
  key: keyof RawBuildSpec,
  errors: string[],
): number | undefined {
  const value = settings[key];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }

  const parsed = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed <= 0) {
    errors.push(`${key} must be a positive integer.`);
    return undefined;
  }

  return parsed;
}

function readHardDriveInterface(settings: Record<string, unknown>, errors: string[]): HardDriveInterface {
  const value = readString(settings, "hard_drive_interface", errors).toLowerCase();
  if (!value) {
    return DEFAULT_HARD_DRIVE_INTERFACE;
  }

  if (value !== "ide" && value !== "sata") {
    errors.push(`Unsupported hard_drive_interface '${value}'. Supported values: ide, sata.`);
    return DEFAULT_HARD_DRIVE_INTERFACE;
  }

  return value === "sata" ? "sata" : "ide";
}
