import { vi } from "vitest";
import type { Responder } from "../src/lib/executor";

/** Silences console output and returns each call joined into one line. */
export function captureConsole() {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  return {
    lines: () => log.mock.calls.map((args) => args.map(String).join(" ")),
    errors: () => error.mock.calls.map((args) => args.map(String).join(" ")),
  };
}

/** Every command succeeds except those listed, which exit with the given status. */
export function respond(failures: Record<string, number> = {}): Responder {
  return (cmd) => ({ code: failures[cmd.join(" ")] ?? 0, stdout: "", stderr: "" });
}
