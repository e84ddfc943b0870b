import { CommandFailedError, DriverUnavailableError, type CommandOutput } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import { formatCommandLine, type CommandResult, type CommandRunner } from "./command-runner";
import type { CreateVmSpec, Driver, StorageController } from "./driver";

const log = createLogger({ component: "driver" });

// VBoxManage sometimes reports failures on stderr yet still exits 0.
const FAILURE_SIGNATURE = /VBoxManage(\.exe)?: error:/;

const HDD_PORT = 0;
const DVD_PORT = 1;

export interface ToolVersion {
  raw: string;
  major: number;
  minor: number;
  patch: number;
}

export function parseToolVersion(output: string): ToolVersion | null {
  // Kernel-module warnings may precede the version line.
  const match = /^(\d+)\.(\d+)\.(\d+)\S*$/m.exec(output.trim());
  if (!match) {
    return null;
  }

  return {
    raw: match[0],
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export async function readToolVersion(toolPath: string, runner: CommandRunner): Promise<ToolVersion> {
  let result: CommandResult;
  try {
    result = await runner(toolPath, ["--version"]);
  } catch (error) {
    throw new DriverUnavailableError(`Unable to run ${toolPath}.`, [
      error instanceof Error ? error.message : String(error),
      "Verify that VirtualBox is installed and VBoxManage is executable.",
    ]);
  }

  const version = result.exitCode === 0 ? parseToolVersion(result.stdout) : null;
  if (!version) {
    throw new DriverUnavailableError(`Could not determine the VirtualBox version from ${toolPath}.`, [
      `Command: ${formatCommandLine(toolPath, ["--version"])}`,
      result.stderr.trim() || result.stdout.trim() || `Exited with status ${result.exitCode ?? "unknown"}.`,
    ]);
  }

  return version;
}

/**
 * Shared translation of driver operations into VBoxManage invocations.
 * Subclasses override the subcommands whose syntax differs by version.
 */
export abstract class VBoxManageDriver implements Driver {
  /** Human-readable range for error hints, e.g. "4.x". */
  protected abstract readonly supportedRange: string;

  protected abstract supportsMajor(major: number): boolean;

  constructor(
    public readonly toolPath: string,
    protected readonly toolVersion: ToolVersion,
    protected readonly runner: CommandRunner,
  ) {}

  get version(): string {
    return this.toolVersion.raw;
  }

  async verify(): Promise<void> {
    const current = await readToolVersion(this.toolPath, this.runner);
    if (!this.supportsMajor(current.major)) {
      throw new DriverUnavailableError(
        `VirtualBox ${current.raw} is not supported by the ${this.constructor.name}.`,
        [`Supported versions: ${this.supportedRange}.`],
      );
    }
  }

  async suppressMessages(signal?: AbortSignal): Promise<void> {
    const extraData: Record<string, string> = {
      "GUI/RegistrationData": "triesLeft=0",
      "GUI/SuppressMessages":
        "confirmInputCapture,remindAboutAutoCapture,remindAboutMouseIntegrationOff,remindAboutMouseIntegrationOn,remindAboutWrongColorDepth",
      "GUI/UpdateDate": `1 d, ${new Date().getFullYear() + 1}-01-01, stable`,
      "GUI/UpdateCheckCount": "60",
    };

    for (const [key, value] of Object.entries(extraData)) {
      await this.vboxManage(["setextradata", "global", key, value], signal);
    }
  }

  async createVM(spec: CreateVmSpec, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(
      ["createvm", "--name", spec.name, "--ostype", spec.osType, "--basefolder", spec.baseFolder, "--register"],
      signal,
    );
  }

  async deleteVM(name: string, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(["unregistervm", name, "--delete"], signal);
  }

  async createDisk(filePath: string, sizeMb: number, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(["createhd", "--filename", filePath, "--size", String(sizeMb), "--format", "VDI"], signal);
  }

  async closeMedium(filePath: string, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(["closemedium", "disk", filePath, "--delete"], signal);
  }

  async addStorageController(vmName: string, controller: StorageController, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(["storagectl", vmName, "--name", controller.name, "--add", controller.bus], signal);
  }

  async attachDisk(
    vmName: string,
    controller: StorageController,
    filePath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.vboxManage(
      [
        "storageattach",
        vmName,
        "--storagectl",
        controller.name,
        "--port",
        String(HDD_PORT),
        "--device",
        "0",
        "--type",
        "hdd",
        "--medium",
        filePath,
      ],
      signal,
    );
  }

  async attachMedium(
    vmName: string,
    controller: StorageController,
    isoPath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.vboxManage(
      [
        "storageattach",
        vmName,
        "--storagectl",
        controller.name,
        "--port",
        String(DVD_PORT),
        "--device",
        "0",
        "--type",
        "dvddrive",
        "--medium",
        isoPath,
      ],
      signal,
    );
  }

  async detachMedium(vmName: string, controller: StorageController, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(
      ["storageattach", vmName, "--storagectl", controller.name, "--port", String(DVD_PORT), "--device", "0", "--medium", "none"],
      signal,
    );
  }

  async vboxManage(args: string[], signal?: AbortSignal): Promise<CommandOutput> {
    const commandLine = formatCommandLine(this.toolPath, args);
    log.debug("executing VBoxManage", { command: commandLine });

    let result: CommandResult;
    try {
      result = await this.runner(this.toolPath, args, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new CommandFailedError(
        `Failed to start VBoxManage: ${error instanceof Error ? error.message : String(error)}`,
        commandLine,
        null,
        { stdout: "", stderr: "" },
      );
    }

    const output: CommandOutput = { stdout: result.stdout, stderr: result.stderr };
    log.debug("VBoxManage finished", { command: commandLine, exitCode: result.exitCode });

    if (result.exitCode !== 0) {
      throw new CommandFailedError(
        `VBoxManage ${args[0] ?? ""} exited with status ${result.exitCode ?? "unknown"}.`,
        commandLine,
        result.exitCode,
        output,
      );
    }

    if (FAILURE_SIGNATURE.test(result.stderr)) {
      throw new CommandFailedError(`VBoxManage ${args[0] ?? ""} reported an error.`, commandLine, result.exitCode, output);
    }

    return output;
  }
}
