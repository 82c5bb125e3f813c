import { bootDirectory, bootFileTarget, type BootmakerConfig } from "./config";
import { ejectDevice, showDiskLayout, validateTargetDevice } from "./devices";
import { downloadBootloader } from "./download";
import { FatalError, OperationCancelled } from "./errors";
import { withSudo, type Executor } from "./executor";
import { ensureDirectory, mountDevice, showMountedContents, unmountPath } from "./mount";
import { buildBootstrapUrl, isFarmId, parseNetwork, type Network, type NetworkCode } from "./network";
import { askInput, askUntil, confirm, waitForEnter, type Prompter } from "./prompt";

export type BootmakerContext = {
  exec: Executor;
  prompter: Prompter;
  config: BootmakerConfig;
};

/** Everything collected before the device is touched. */
export type Session = {
  device: string;
  networkCode: NetworkCode;
  farmId: string;
  url: string;
};

function banner(message: string) {
  console.log();
  console.log(message);
  console.log();
}

export async function acknowledgeDiskLayout(ctx: BootmakerContext): Promise<void> {
  console.log();
  console.log("Current disk layout:");
  console.log();
  await showDiskLayout(ctx.exec);
  banner("This is your current disk layout. Consider this before proceeding.");
  await waitForEnter(ctx.prompter);
}

/** Pre-flight unmount. Its failure is reported and the run goes on. */
export async function offerUnmount(ctx: BootmakerContext): Promise<void> {
  if (!(await confirm(ctx.prompter, "Do you want to unmount a disk?"))) return;

  const path = await askInput(ctx.prompter, "Enter the path to unmount (e.g., /mnt/usb)");
  if (!path) return;
  console.log(`Unmounting ${path}...`);
  const res = await unmountPath(ctx.exec, path, ctx.config.sudo);
  if (res.code !== 0) {
    console.log(`Error unmounting ${path} (exit code: ${res.code})`);
  }
}

export function selectDevice(ctx: BootmakerContext): Promise<string> {
  return askUntil(ctx.prompter, {
    question: "Enter the disk to format (e.g., /dev/sdb) (or type 'exit'): ",
    accept: async (answer) => ((await validateTargetDevice(ctx.exec, answer)) ? answer : undefined),
    invalidMessage: "Error: Invalid disk format or device does not exist. Please enter /dev/sdX (e.g., /dev/sdb).",
  });
}

export function selectNetwork(ctx: BootmakerContext): Promise<{ network: Network; code: NetworkCode }> {
  return askUntil(ctx.prompter, {
    question: "Enter the network (mainnet, devnet, testnet, qanet) (or type 'exit'): ",
    accept: (answer) => parseNetwork(answer),
    invalidMessage: "Invalid network. Please enter mainnet, devnet, testnet, or qanet.",
  });
}

export function selectFarmId(ctx: BootmakerContext): Promise<string> {
  return askUntil(ctx.prompter, {
    question: "Enter the farm ID (positive integer, or type 'exit'): ",
    accept: (answer) => (isFarmId(answer) ? answer : undefined),
    invalidMessage: "Invalid farm ID. Please enter a positive integer or 'exit'.",
  });
}

export async function collectSession(ctx: BootmakerContext): Promise<Session> {
  const device = await selectDevice(ctx);
  const { code } = await selectNetwork(ctx);
  const farmId = await selectFarmId(ctx);
  const url = buildBootstrapUrl(code, farmId, ctx.config.baseUrl);

  banner(`The URL to download the bootstrap image is the following: ${url}`);
  return { device, networkCode: code, farmId, url };
}

/**
 * Format, mount, fetch, show and unmount. Every failure up to the fetch is
 * fatal; once mounted, any failure unmounts before it propagates.
 */
export async function writeBootloader(ctx: BootmakerContext, session: Session): Promise<void> {
  const { exec, config } = ctx;
  const { sudo, mountPoint } = config;

  banner(`Formatting ${session.device} with FAT32...`);
  const format = await exec.run(withSudo(["mkfs.vfat", "-F", "32", "-I", session.device], sudo), {
    inherit: true,
    allowNonZeroExit: true,
  });
  if (format.code !== 0) throw new FatalError("Error formatting disk", format);

  await ensureDirectory(exec, mountPoint, sudo);

  banner("Mounting formatted disk...");
  const mount = await mountDevice(exec, session.device, mountPoint, sudo);
  if (mount.code !== 0) throw new FatalError("Error mounting formatted disk", mount);

  try {
    banner("Creating EFI boot directory...");
    await ensureDirectory(exec, bootDirectory(config), sudo);

    banner(`Downloading iPXE file from ${session.url}...`);
    const download = await downloadBootloader(exec, session.url, bootFileTarget(config), sudo);
    if (download.code !== 0) throw new FatalError("Error downloading iPXE file", download);
  } catch (e) {
    // Best effort; the original failure is the one reported
    await unmountPath(exec, mountPoint, sudo).catch((cleanupError: unknown) => {
      console.error(`Cleanup unmount of ${mountPoint} failed: ${cleanupError instanceof Error ? cleanupError.message : String(cleanupError)}`);
    });
    throw e;
  }

  await showMountedContents(exec, mountPoint);

  banner("Unmounting temporary mount point...");
  await unmountPath(exec, mountPoint, sudo);

  banner("The ZOS bootstrap image has been copied to the USB key.");
}

export async function offerEject(ctx: BootmakerContext, session: Session): Promise<void> {
  if (!(await confirm(ctx.prompter, "Do you want to eject the disk?"))) return;

  banner(`Ejecting ${session.device}...`);
  const res = await ejectDevice(ctx.exec, session.device, ctx.config.sudo);
  if (res.code !== 0) throw new FatalError("Error ejecting disk", res);
  console.log("Disk ejected successfully");
}

export async function runBootmaker(ctx: BootmakerContext): Promise<Session> {
  await acknowledgeDiskLayout(ctx);
  await offerUnmount(ctx);
  const session = await collectSession(ctx);

  if (!(await confirm(ctx.prompter, `Are you sure you want to format ${session.device}? This will ERASE ALL DATA`))) {
    throw new OperationCancelled();
  }

  await writeBootloader(ctx, session);
  await offerEject(ctx, session);

  banner("Operation completed.");
  return session;
}
