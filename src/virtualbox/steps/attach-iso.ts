import { storageControllerFor } from "../driver";
import { CONTINUE, type Step } from "../pipeline/step";

export function createAttachIsoStep(): Step {
  return {
    id: "attach-iso",
    description: "Insert the installation ISO into the VM's DVD drive.",

    async run(context) {
      const { config, driver, ui } = context;
      const isoPath = context.values.require("isoPath");
      const vmName = context.values.require("vmName");
      const controller = storageControllerFor(config.hardDriveInterface);

      ui.say(`Attaching ISO to the ${controller.name}...`);
      await driver.attachMedium(vmName, controller, isoPath, context.signal);

      context.values.set("attachedMedium", isoPath);
      return CONTINUE;
    },

    // Runs on success too: the finished VM must not reference the cached ISO.
    async cleanup(context) {
      const vmName = context.values.get("vmName");
      if (!vmName || !context.values.has("attachedMedium")) {
        return;
      }

      context.ui.message("Detaching ISO from the VM...");
      await context.driver.detachMedium(vmName, storageControllerFor(context.config.hardDriveInterface));
    },
  };
}
