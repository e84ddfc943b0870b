import type { CommandOutput } from "../../shared/cli-errors";
import type { HardDriveInterface } from "../types";

export interface StorageController {
  name: string;
  bus: HardDriveInterface;
}

export interface CreateVmSpec {
  name: string;
  osType: string;
  /** Directory VirtualBox places the VM's settings folder under. */
  baseFolder: string;
}

/**
 * Everything the build steps need from VirtualBox. One implementation per
 * supported VBoxManage major version; steps never branch on the version.
 *
 * Methods that accept a signal kill the underlying VBoxManage process when it
 * aborts. Cleanup code calls them without one so it can run after a cancel.
 */
export interface Driver {
  readonly toolPath: string;
  readonly version: string;

  verify(): Promise<void>;
  suppressMessages(signal?: AbortSignal): Promise<void>;
  createVM(spec: CreateVmSpec, signal?: AbortSignal): Promise<void>;
  deleteVM(name: string, signal?: AbortSignal): Promise<void>;
  createDisk(filePath: string, sizeMb: number, signal?: AbortSignal): Promise<void>;
  /** Unregisters a disk image that no VM references and deletes its file. */
  closeMedium(filePath: string, signal?: AbortSignal): Promise<void>;
  addStorageController(vmName: string, controller: StorageController, signal?: AbortSignal): Promise<void>;
  attachDisk(vmName: string, controller: StorageController, filePath: string, signal?: AbortSignal): Promise<void>;
  attachMedium(vmName: string, controller: StorageController, isoPath: string, signal?: AbortSignal): Promise<void>;
  detachMedium(vmName: string, controller: StorageController, signal?: AbortSignal): Promise<void>;
  /** Escape hatch for subcommands without a dedicated method. */
  vboxManage(args: string[], signal?: AbortSignal): Promise<CommandOutput>;
}

export function storageControllerFor(bus: HardDriveInterface): StorageController {
  return bus === "sata" ? { name: "SATA Controller", bus } : { name: "IDE Controller", bus };
}
