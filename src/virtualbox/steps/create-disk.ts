import path from "node:path";

import { storageControllerFor } from "../driver";
import { isUnwinding } from "../pipeline/context";
import { CONTINUE, type Step } from "../pipeline/step";

export function createCreateDiskStep(): Step {
  return {
    id: "create-disk",
    description: "Create the VM's hard disk and attach it to a new storage controller.",

    async run(context) {
      const { config, driver, ui, signal } = context;
      const outputDir = context.values.require("outputDir");
      const vmName = context.values.require("vmName");
      const diskPath = path.join(outputDir, `${vmName}.vdi`);
      const controller = storageControllerFor(config.hardDriveInterface);

      ui.say(`Creating hard drive (${config.diskSize} MB)...`);
      await driver.createDisk(diskPath, config.diskSize, signal);
      context.values.set("createdDisk", diskPath);

      ui.message(`Attaching hard drive to the ${controller.name}...`);
      await driver.addStorageController(vmName, controller, signal);
      await driver.attachDisk(vmName, controller, diskPath, signal);

      context.values.set("diskPath", diskPath);
      return CONTINUE;
    },

    // An attached disk goes away with the VM; an unattached one stays in the media registry.
    async cleanup(context) {
      const createdDisk = context.values.get("createdDisk");
      if (!createdDisk || context.values.has("diskPath") || !isUnwinding(context)) {
        return;
      }

      context.ui.say("Deleting unattached hard drive...");
      await context.driver.closeMedium(createdDisk);
    },
  };
}
