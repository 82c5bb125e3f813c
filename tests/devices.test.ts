import { describe, it, expect } from "vitest";
import { ejectDevice, TARGET_DEVICE_PATTERN, validateTargetDevice } from "../src/lib/devices";
import { RecordingExecutor } from "../src/lib/executor";
import { respond } from "./helpers";

describe("TARGET_DEVICE_PATTERN", () => {
  it("accepts /dev/sdb through /dev/sdz", () => {
    for (const d of ["/dev/sdb", "/dev/sdk", "/dev/sdz"]) {
      expect(TARGET_DEVICE_PATTERN.test(d)).toBe(true);
    }
  });

  it("rejects sda, partitions and other device kinds", () => {
    for (const d of ["/dev/sda", "/dev/sdb1", "/dev/SDB", "/dev/nvme0n1", "sdb", "/dev/sdaa", ""]) {
      expect(TARGET_DEVICE_PATTERN.test(d)).toBe(false);
    }
  });
});

describe("validateTargetDevice (mocked)", () => {
  it("never probes /dev/sda", async () => {
    const exec = new RecordingExecutor(respond());
    expect(await validateTargetDevice(exec, "/dev/sda")).toBe(false);
    expect(exec.calls).toHaveLength(0);
  });

  it("accepts a matching path that is a block device", async () => {
    const exec = new RecordingExecutor(respond());
    expect(await validateTargetDevice(exec, "/dev/sdb")).toBe(true);
    expect(exec.commands()).toEqual(["test -b /dev/sdb"]);
  });

  it("rejects a matching path that does not exist", async () => {
    const exec = new RecordingExecutor(respond({ "test -b /dev/sdc": 1 }));
    expect(await validateTargetDevice(exec, "/dev/sdc")).toBe(false);
  });
});

describe("ejectDevice", () => {
  it("returns the eject status instead of throwing", async () => {
    const exec = new RecordingExecutor(respond({ "sudo eject /dev/sdb": 1 }));
    const res = await ejectDevice(exec, "/dev/sdb", true);
    expect(res.code).toBe(1);
  });
});
