export const PROGRAM_NAME = "zos-bootmaker";

export function usageText(version: string): string {
  return `
==========================
ZERO-OS BOOTMAKER v${version}
==========================

Formats a USB drive with FAT32 and installs an iPXE bootloader that boots a
ThreeFold Grid v3 Zero-OS node.

The Zero-OS bootstrap image format is an EFI file for UEFI.

Usage:
  ${PROGRAM_NAME} [options]
  ${PROGRAM_NAME} help

Options:
  help, -h, --help           Display this help message
  version, -v, --version     Print version
  --base-url <url>           Bootstrap server (default https://bootstrap.grid.tf)
  --mount-point <path>       Temporary mount point (default /mnt/temp_usb)
  --no-sudo                  Run privileged commands without sudo
  --verbose                  Echo every command and print the run duration

Environment:
  ZOS_BOOTMAKER_BASE_URL, ZOS_BOOTMAKER_MOUNT_POINT,
  ZOS_BOOTMAKER_SUDO (0/1), ZOS_BOOTMAKER_VERBOSE (0/1)

Steps:
1. Displays the current disk layout.
2. Prompts for a path to unmount (optional).
3. Prompts for the disk to format (e.g., /dev/sdb). Must be a valid device.
4. Prompts for the network (mainnet, devnet, testnet, qanet).
5. Prompts for the farm ID.
6. Confirms the formatting operation.
7. Formats the disk with FAT32.
8. Creates a temporary mount point.
9. Mounts the formatted disk.
10. Downloads the iPXE bootloader from the ThreeFold Grid bootstrap server
    to EFI/BOOT/BOOTX64.EFI on the disk.
11. Shows the contents of the disk.
12. Unmounts the temporary mount point.
13. Optionally ejects the USB drive.

Type 'exit' at any prompt to quit.

Examples:
  ${PROGRAM_NAME}
  ${PROGRAM_NAME} help
  ${PROGRAM_NAME} --no-sudo --mount-point /media/zos
`;
}
