import type { StorageController } from "./driver";
import { VBoxManageDriver } from "./vboxmanage-driver";

/**
 * VirtualBox 5.0 and later. `createhd` became `createmedium disk`, and
 * emptying a DVD slot needs an explicit drive type.
 */
export class VBox5Driver extends VBoxManageDriver {
  protected readonly supportedRange = "5.x and later";

  protected supportsMajor(major: number): boolean {
    return major >= 5;
  }

  override async createDisk(filePath: string, sizeMb: number, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(
      ["createmedium", "disk", "--filename", filePath, "--size", String(sizeMb), "--format", "VDI"],
      signal,
    );
  }

  override async detachMedium(vmName: string, controller: StorageController, signal?: AbortSignal): Promise<void> {
    await this.vboxManage(
      [
        "storageattach",
        vmName,
        "--storagectl",
        controller.name,
        "--port",
        "1",
        "--device",
        "0",
        "--type",
        "dvddrive",
        "--medium",
        "emptydrive",
      ],
      signal,
    );
  }
}
