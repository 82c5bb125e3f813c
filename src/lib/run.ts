import pkg from "../../package.json";
import { booleanArg, parseArgs, stringArg } from "./args";
import { runBootmaker } from "./bootmaker";
import { resolveConfig, type ConfigOverrides } from "./config";
import { FatalError, OperationCancelled, UserAbort } from "./errors";
import { EchoingExecutor, NodeExecutor, type Executor } from "./executor";
import { ReadlinePrompter, type Prompter } from "./prompt";
import { usageText } from "./usage";

export const VERSION: string = pkg.version;

const HELP_TOKENS = new Set(["help", "-h", "--help"]);
const VERSION_TOKENS = new Set(["version", "-v", "--version"]);

export type RunDeps = {
  exec?: Executor;
  prompter?: Prompter;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
};

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

function flagsToOverrides(argv: string[]): ConfigOverrides {
  const { args } = parseArgs(argv, [
    { name: "base-url", type: "string" },
    { name: "mount-point", type: "string" },
    { name: "no-sudo", type: "boolean" },
    { name: "verbose", type: "boolean" },
  ]);
  return {
    baseUrl: stringArg(args, "base-url"),
    mountPoint: stringArg(args, "mount-point"),
    sudo: booleanArg(args, "no-sudo") ? false : undefined,
    verbose: booleanArg(args, "verbose") ? true : undefined,
  };
}

/** Runs the CLI and resolves with the process exit status. */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const first = argv[0]?.toLowerCase();
  if ((first !== undefined && HELP_TOKENS.has(first)) || argv.includes("-h") || argv.includes("--help")) {
    console.log(usageText(VERSION));
    return 0;
  }
  if (first !== undefined && VERSION_TOKENS.has(first)) {
    console.log(VERSION);
    return 0;
  }

  const now = deps.now ?? Date.now;
  const startTime = now();
  let prompter = deps.prompter;

  try {
    const config = resolveConfig(deps.env ?? process.env, flagsToOverrides(argv));
    const baseExec = deps.exec ?? new NodeExecutor();
    const exec = config.verbose ? new EchoingExecutor(baseExec) : baseExec;
    prompter ??= new ReadlinePrompter();

    await runBootmaker({ exec, prompter, config });

    if (config.verbose) {
      console.log(`[DURATION] ${formatDuration(now() - startTime)}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof UserAbort) {
      console.log(e.message);
      return 0;
    }
    if (e instanceof OperationCancelled) {
      console.log();
      console.log(e.message);
      console.log();
      return 0;
    }
    if (e instanceof FatalError) {
      console.error(e.message);
      return 1;
    }
    console.error(e instanceof Error ? e.message : String(e));
    return 1;
  } finally {
    prompter?.close();
  }
}
