import { COMMAND_NOT_FOUND, withSudo, type Executor, type ExecResult } from "./executor";

export function unmountPath(exec: Executor, path: string, sudo: boolean): Promise<ExecResult> {
  return exec.run(withSudo(["umount", "--", path], sudo), { inherit: true, allowNonZeroExit: true });
}

/** `mkdir -p`; a failure throws `CommandError`. */
export function ensureDirectory(exec: Executor, path: string, sudo: boolean): Promise<ExecResult> {
  return exec.run(withSudo(["mkdir", "-p", path], sudo), { inherit: true });
}

export function mountDevice(exec: Executor, device: string, mountPoint: string, sudo: boolean): Promise<ExecResult> {
  return exec.run(withSudo(["mount", device, mountPoint], sudo), { inherit: true, allowNonZeroExit: true });
}

/**
 * Prints the tree under the mount point, or `ls -lR` where `tree` is not
 * installed. A missing mount point is reported, never thrown.
 */
export async function showMountedContents(exec: Executor, mountPoint: string): Promise<void> {
  const dir = await exec.run(["test", "-d", mountPoint], { allowNonZeroExit: true });
  if (dir.code !== 0) {
    console.log("Error: Temporary mount point not found.");
    return;
  }

  console.log();
  console.log(`Contents of the mounted disk (${mountPoint}):`);
  console.log();
  const tree = await exec.run(["tree", mountPoint], { inherit: true, allowNonZeroExit: true });
  if (tree.code === COMMAND_NOT_FOUND) {
    await exec.run(["ls", "-lR", mountPoint], { inherit: true, allowNonZeroExit: true });
  }
  console.log();
}
