import { z } from "zod";
import { withSudo, type Executor, type ExecResult } from "./executor";

// sdb..sdz only; /dev/sda is never a target
export const TARGET_DEVICE_PATTERN = /^\/dev\/sd[b-z]$/;

export const TargetDeviceSchema = z.string().regex(TARGET_DEVICE_PATTERN);

export async function isBlockDevice(exec: Executor, path: string): Promise<boolean> {
  const res = await exec.run(["test", "-b", path], { allowNonZeroExit: true });
  return res.code === 0;
}

/** Both the path pattern and an existing block device are required. */
export async function validateTargetDevice(exec: Executor, input: string): Promise<boolean> {
  if (!TargetDeviceSchema.safeParse(input).success) return false;
  return isBlockDevice(exec, input);
}

export async function showDiskLayout(exec: Executor): Promise<void> {
  await exec.run(["lsblk"], { inherit: true, allowNonZeroExit: true });
}

export function ejectDevice(exec: Executor, device: string, sudo: boolean): Promise<ExecResult> {
  return exec.run(withSudo(["eject", device], sudo), { inherit: true, allowNonZeroExit: true });
}
