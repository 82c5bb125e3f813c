import { afterEach, describe, it, expect, vi } from "vitest";
import pkg from "../package.json";
import { RecordingExecutor } from "../src/lib/executor";
import { ScriptedPrompter } from "../src/lib/prompt";
import { formatDuration, run } from "../src/lib/run";
import { captureConsole, respond } from "./helpers";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("help and version", () => {
  for (const argv of [["help"], ["HELP"], ["-h"], ["--help"]]) {
    it(`prints usage for ${argv[0]} without touching any device`, async () => {
      const out = captureConsole();
      const exec = new RecordingExecutor();
      const prompter = new ScriptedPrompter([]);
      expect(await run(argv, { exec, prompter, env: {} })).toBe(0);
      expect(out.lines()[0]).toContain(`ZERO-OS BOOTMAKER v${pkg.version}`);
      expect(exec.calls).toHaveLength(0);
      expect(prompter.questions).toHaveLength(0);
    });
  }

  it("prints the version", async () => {
    const out = captureConsole();
    expect(await run(["--version"], { exec: new RecordingExecutor(), env: {} })).toBe(0);
    expect(out.lines()).toEqual([pkg.version]);
  });
});

describe("options", () => {
  it("runs without sudo on a custom mount point", async () => {
    captureConsole();
    const exec = new RecordingExecutor(respond());
    const prompter = new ScriptedPrompter(["", "n", "/dev/sdd", "qanet", "12", "y", "n"]);
    const code = await run(["--no-sudo", "--mount-point", "/media/zos/", "--base-url", "https://mirror.example/"], {
      exec,
      prompter,
      env: {},
    });
    expect(code).toBe(0);
    expect(exec.commands()).toEqual([
      "lsblk",
      "test -b /dev/sdd",
      "mkfs.vfat -F 32 -I /dev/sdd",
      "mkdir -p /media/zos",
      "mount /dev/sdd /media/zos",
      "mkdir -p /media/zos/EFI/BOOT",
      "curl -fL https://mirror.example/uefi/qa/12 -o /media/zos/EFI/BOOT/BOOTX64.EFI",
      "test -d /media/zos",
      "tree /media/zos",
      "umount -- /media/zos",
    ]);
  });

  it("echoes commands and prints the duration when verbose", async () => {
    const out = captureConsole();
    const ticks = [0, 65_000];
    const code = await run(["--verbose"], {
      exec: new RecordingExecutor(respond()),
      prompter: new ScriptedPrompter(["", "n", "/dev/sdb", "mainnet", "5", "y", "n"]),
      env: {},
      now: () => ticks.shift() ?? 0,
    });
    expect(code).toBe(0);
    expect(out.lines()).toContain("$ sudo mkfs.vfat -F 32 -I /dev/sdb");
    expect(out.lines().at(-1)).toBe("[DURATION] 1m 5s");
  });

  it("fails on an unknown flag before prompting", async () => {
    const out = captureConsole();
    const exec = new RecordingExecutor();
    const prompter = new ScriptedPrompter([""]);
    expect(await run(["--bogus"], { exec, prompter, env: {} })).toBe(1);
    expect(out.errors()).toEqual(["Unknown argument: --bogus"]);
    expect(exec.calls).toHaveLength(0);
    expect(prompter.questions).toHaveLength(0);
  });

  it("fails on invalid configuration from the environment", async () => {
    const out = captureConsole();
    const code = await run([], {
      exec: new RecordingExecutor(),
      prompter: new ScriptedPrompter([]),
      env: { ZOS_BOOTMAKER_BASE_URL: "ftp://mirror.example" },
    });
    expect(code).toBe(1);
    expect(out.errors()).toEqual(["Invalid configuration: baseUrl: must be an http(s) URL"]);
  });
});

describe("formatDuration", () => {
  it("formats seconds, minutes and hours", () => {
    expect(formatDuration(4_999)).toBe("4s");
    expect(formatDuration(65_000)).toBe("1m 5s");
    expect(formatDuration(3_725_000)).toBe("1h 2m 5s");
  });
});
