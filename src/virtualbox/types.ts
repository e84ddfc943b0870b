export type ChecksumType = "md5" | "sha1" | "sha256" | "sha512";

export type HardDriveInterface = "ide" | "sata";

export type IsoScheme = "file" | "http" | "https";

/** Raw template keys, as written by users. */
export interface RawBuildSpec {
  guest_os_type?: unknown;
  output_directory?: unknown;
  vm_name?: unknown;
  iso_url?: unknown;
  iso_checksum?: unknown;
  iso_checksum_type?: unknown;
  disk_size?: unknown;
  hard_drive_interface?: unknown;
}

export interface BuildConfig {
  readonly guestOsType: string;
  readonly outputDirectory: string;
  readonly vmName: string;
  /** Canonical URL; doubles as the download cache key. */
  readonly isoUrl: string;
  readonly isoScheme: IsoScheme;
  readonly isoChecksum: string;
  readonly isoChecksumType: ChecksumType;
  /** Megabytes. */
  readonly diskSize: number;
  readonly hardDriveInterface: HardDriveInterface;
  readonly force: boolean;
}

export interface BuilderCliOptions {
  templatePath: string;
  cacheDir?: string;
  vboxManagePath?: string;
  force: boolean;
  dryRun: boolean;
}

/** Sink for user-facing build progress. */
export interface BuildUi {
  /** A headline for a new phase of the build. */
  say(message: string): void;
  /** Detail within the current phase. */
  message(message: string): void;
  error(message: string): void;
}

export interface HookEvent {
  step: string;
  index: number;
  total: number;
}

export type PostStepHook = (event: HookEvent) => Promise<void>;

export interface PlannedStep {
  id: string;
  description: string;
}

export interface BuildDryRunPlan {
  command: "vbox-build";
  dryRun: true;
  config: BuildConfig;
  steps: PlannedStep[];
}
