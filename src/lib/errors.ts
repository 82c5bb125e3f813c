import type { ExecResult } from "./executor";

/** The user typed the abort token (or closed stdin) at a prompt. Exits with status 0. */
export class UserAbort extends Error {
  constructor() {
    super("Exiting...");
    this.name = "UserAbort";
  }
}

/** The user declined the format confirmation. Exits with status 0. */
export class OperationCancelled extends Error {
  constructor() {
    super("Operation cancelled.");
    this.name = "OperationCancelled";
  }
}

/** A format, mount, download or eject step failed. Exits with status 1. */
export class FatalError extends Error {
  constructor(message: string, readonly result?: ExecResult) {
    super(message);
    this.name = "FatalError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CommandError extends Error {
  constructor(readonly cmd: string[], readonly result: ExecResult) {
    super(`Command failed (${result.code}): ${cmd.join(" ")}${result.stderr ? `\n${result.stderr}` : ""}`);
    this.name = "CommandError";
  }
}
