import { describe, expect, it } from "vitest";

import { CommandFailedError, DriverUnavailableError } from "../src/shared/cli-errors";
import { createDriver, storageControllerFor } from "../src/virtualbox/driver";
import { parseToolVersion } from "../src/virtualbox/driver/vboxmanage-driver";
import { FAKE_VBOXMANAGE, createFakeVBoxManage } from "./helpers/fakes";

describe("parseToolVersion", () => {
  it("reads the version past warning lines", () => {
    const output = "WARNING: The vboxdrv kernel module is not loaded.\n6.1.50r161033\n";

    expect(parseToolVersion(output)).toEqual({ raw: "6.1.50r161033", major: 6, minor: 1, patch: 50 });
  });

  it("returns null when no version is present", () => {
    expect(parseToolVersion("command not found")).toBeNull();
  });
});

describe("createDriver", () => {
  it("uses createhd on VirtualBox 4", async () => {
    const fake = createFakeVBoxManage("4.3.40r117311");
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);

    await driver.createDisk("/vms/a.vdi", 1024);

    expect(driver.version).toBe("4.3.40r117311");
    expect(fake.mutatingCalls()).toEqual([
      ["createhd", "--filename", "/vms/a.vdi", "--size", "1024", "--format", "VDI"],
    ]);
  });

  it("uses createmedium and emptydrive on VirtualBox 7", async () => {
    const fake = createFakeVBoxManage("7.0.12r159484");
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);
    const controller = storageControllerFor("sata");

    await driver.createDisk("/vms/a.vdi", 2048);
    await driver.detachMedium("demo", controller);

    expect(fake.mutatingCalls()).toEqual([
      ["createmedium", "disk", "--filename", "/vms/a.vdi", "--size", "2048", "--format", "VDI"],
      [
        "storageattach",
        "demo",
        "--storagectl",
        "SATA Controller",
        "--port",
        "1",
        "--device",
        "0",
        "--type",
        "dvddrive",
        "--medium",
        "emptydrive",
      ],
    ]);
  });

  it("accepts majors newer than the ones it was written against", async () => {
    const fake = createFakeVBoxManage("8.0.0r170000");
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);

    await driver.createDisk("/vms/a.vdi", 512);

    expect(driver.version).toBe("8.0.0r170000");
    expect(fake.mutatingCalls()).toEqual([
      ["createmedium", "disk", "--filename", "/vms/a.vdi", "--size", "512", "--format", "VDI"],
    ]);
  });

  it("deletes a disk image through closemedium", async () => {
    const fake = createFakeVBoxManage();
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);

    await driver.closeMedium("/vms/a.vdi");

    expect(fake.mutatingCalls()).toEqual([["closemedium", "disk", "/vms/a.vdi", "--delete"]]);
  });

  it("probes the version again when verifying", async () => {
    const fake = createFakeVBoxManage("5.2.44r139111");
    await createDriver(FAKE_VBOXMANAGE, fake.runner);

    expect(fake.calls).toEqual([["--version"], ["--version"]]);
  });

  it("rejects VirtualBox releases older than 4", async () => {
    const fake = createFakeVBoxManage("3.2.28r100309");

    await expect(createDriver(FAKE_VBOXMANAGE, fake.runner)).rejects.toThrow(
      new DriverUnavailableError("VirtualBox 3.2.28r100309 is too old."),
    );
  });

  it("reports an unreadable version", async () => {
    const fake = createFakeVBoxManage("garbage");

    await expect(createDriver(FAKE_VBOXMANAGE, fake.runner)).rejects.toBeInstanceOf(DriverUnavailableError);
  });
});

describe("VBoxManage invocations", () => {
  it("raises CommandFailedError with the command and output on a non-zero exit", async () => {
    const fake = createFakeVBoxManage();
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);
    fake.failOn("createvm", { exitCode: 1, stdout: "partial", stderr: "VM already exists" });

    const error = await driver
      .createVM({ name: "demo", osType: "Ubuntu_64", baseFolder: "/vms" })
      .then(() => null, (reason: unknown) => reason);

    expect(error).toBeInstanceOf(CommandFailedError);
    if (!(error instanceof CommandFailedError)) {
      return;
    }
    expect(error.message).toBe("VBoxManage createvm exited with status 1.");
    expect(error.command).toBe(
      "/opt/fake/VBoxManage createvm --name demo --ostype Ubuntu_64 --basefolder /vms --register",
    );
    expect(error.exitCode).toBe(1);
    expect(error.output).toEqual({ stdout: "partial", stderr: "VM already exists" });
  });

  it("treats the error signature on stderr as a failure despite exit code 0", async () => {
    const fake = createFakeVBoxManage();
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);
    fake.failOn("storagectl", {
      exitCode: 0,
      stdout: "",
      stderr: "VBoxManage: error: Could not find a registered machine named 'demo'\n",
    });

    await expect(driver.addStorageController("demo", storageControllerFor("ide"))).rejects.toThrow(
      "VBoxManage storagectl reported an error.",
    );
  });

  it("sets the four global extra-data keys to suppress GUI prompts", async () => {
    const fake = createFakeVBoxManage();
    const driver = await createDriver(FAKE_VBOXMANAGE, fake.runner);

    await driver.suppressMessages();

    expect(fake.mutatingCalls().map((args) => args.slice(0, 3))).toEqual([
      ["setextradata", "global", "GUI/RegistrationData"],
      ["setextradata", "global", "GUI/SuppressMessages"],
      ["setextradata", "global", "GUI/UpdateDate"],
      ["setextradata", "global", "GUI/UpdateCheckCount"],
    ]);
  });
});
