import { VBoxManageDriver } from "./vboxmanage-driver";

/** VirtualBox 4.x: the base VBoxManage syntax applies unchanged. */
export class VBox4Driver extends VBoxManageDriver {
  protected readonly supportedRange = "4.x";

  protected supportsMajor(major: number): boolean {
    return major === 4;
  }
}
