import { DriverUnavailableError } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import type { CommandRunner } from "./command-runner";
import type { Driver } from "./driver";
import { VBox4Driver } from "./vbox4-driver";
import { VBox5Driver } from "./vbox5-driver";
import { readToolVersion } from "./vboxmanage-driver";

export type { CommandResult, CommandRunner } from "./command-runner";
export { spawnCommandRunner } from "./command-runner";
export type { CreateVmSpec, Driver, StorageController } from "./driver";
export { storageControllerFor } from "./driver";
export { locateVBoxManage } from "./locate";

const log = createLogger({ component: "driver" });

/**
 * Picks the driver variant for the installed VirtualBox and verifies it.
 * This is the only place that looks at the tool's version.
 */
export async function createDriver(toolPath: string, runner: CommandRunner): Promise<Driver> {
  const version = await readToolVersion(toolPath, runner);
  log.info("detected VirtualBox", { toolPath, version: version.raw });

  let driver: Driver;
  if (version.major === 4) {
    driver = new VBox4Driver(toolPath, version, runner);
  } else if (version.major >= 5) {
    driver = new VBox5Driver(toolPath, version, runner);
  } else {
    throw new DriverUnavailableError(`VirtualBox ${version.raw} is too old.`, [
      "Install VirtualBox 4.0 or later.",
    ]);
  }

  await driver.verify();
  return driver;
}
