import type { Step } from "../pipeline/step";
import { createAttachIsoStep } from "./attach-iso";
import { createCreateDiskStep } from "./create-disk";
import { createCreateVmStep } from "./create-vm";
import { createDownloadIsoStep } from "./download-iso";
import { createPrepareOutputDirStep } from "./prepare-output-dir";
import { createSuppressMessagesStep } from "./suppress-messages";

/** The build pipeline, in execution order. */
export function createBuildSteps(): Step[] {
  return [
    createDownloadIsoStep(),
    createPrepareOutputDirStep(),
    createSuppressMessagesStep(),
    createCreateVmStep(),
    createCreateDiskStep(),
    createAttachIsoStep(),
  ];
}
