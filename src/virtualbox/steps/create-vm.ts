import { isUnwinding } from "../pipeline/context";
import { CONTINUE, type Step } from "../pipeline/step";

export function createCreateVmStep(): Step {
  return {
    id: "create-vm",
    description: "Create and register the virtual machine.",

    async run(context) {
      const { config, driver, ui } = context;
      const outputDir = context.values.require("outputDir");

      ui.say(`Creating virtual machine '${config.vmName}'...`);
      await driver.createVM(
        {
          name: config.vmName,
          osType: config.guestOsType,
          baseFolder: outputDir,
        },
        context.signal,
      );

      context.values.set("vmName", config.vmName);
      return CONTINUE;
    },

    async cleanup(context) {
      const vmName = context.values.get("vmName");
      if (!vmName || !isUnwinding(context)) {
        return;
      }

      // No signal: this has to run even though the build was cancelled.
      context.ui.say("Unregistering and deleting virtual machine...");
      await context.driver.deleteVM(vmName);
    },
  };
}
