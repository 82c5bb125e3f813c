import { spawn } from "node:child_process";
import { CommandError } from "./errors";

export const COMMAND_NOT_FOUND = 127;

export type ExecOptions = {
  // Hand the terminal to the child instead of capturing its output
  inherit?: boolean;
  allowNonZeroExit?: boolean;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export interface Executor {
  run(cmd: string[], options?: ExecOptions): Promise<ExecResult>;
}

export function withSudo(cmd: string[], sudo: boolean): string[] {
  return sudo ? ["sudo", ...cmd] : cmd;
}

export class NodeExecutor implements Executor {
  run(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { inherit, allowNonZeroExit } = options;
    const [file, ...args] = cmd;
    if (!file) return Promise.reject(new Error("Empty command"));

    return new Promise<ExecResult>((resolve, reject) => {
      const proc = spawn(file, args, {
        stdio: ["ignore", inherit ? "inherit" : "pipe", inherit ? "inherit" : "pipe"],
      });

      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let settled = false;

      proc.stdout?.setEncoding("utf8");
      proc.stdout?.on("data", (text: string) => {
        stdoutChunks.push(text);
      });
      proc.stderr?.setEncoding("utf8");
      proc.stderr?.on("data", (text: string) => {
        stderrChunks.push(text);
      });

      const settle = (result: ExecResult) => {
        if (settled) return;
        settled = true;
        if (result.code !== 0 && !allowNonZeroExit) {
          reject(new CommandError(cmd, result));
          return;
        }
        resolve(result);
      };

      proc.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          // Same status a shell reports for a missing binary
          settle({ code: COMMAND_NOT_FOUND, stdout: "", stderr: `${file}: command not found` });
          return;
        }
        if (settled) return;
        settled = true;
        reject(err);
      });

      // code is null when the child was killed by a signal
      proc.on("close", (code) => {
        settle({
          code: code ?? 1,
          stdout: stdoutChunks.join(""),
          stderr: stderrChunks.join(""),
        });
      });
    });
  }
}

/** Prints each command before handing it to the wrapped executor (`--verbose`). */
export class EchoingExecutor implements Executor {
  constructor(private readonly inner: Executor, private readonly write: (line: string) => void = (line) => console.log(line)) {}

  run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    this.write(`$ ${cmd.join(" ")}`);
    return this.inner.run(cmd, options);
  }
}

export type RecordedCall = { cmd: string[]; options?: ExecOptions; result?: ExecResult };

export type Responder = (cmd: string[]) => ExecResult | Promise<ExecResult>;

export class RecordingExecutor implements Executor {
  public calls: RecordedCall[] = [];
  constructor(private responses: Responder | ExecResult = { code: 0, stdout: "", stderr: "" }) {}

  async run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    const res = typeof this.responses === "function" ? await this.responses(cmd) : this.responses;
    const copy: ExecResult = { code: res.code, stdout: res.stdout, stderr: res.stderr };
    this.calls.push({ cmd: [...cmd], options, result: copy });
    if (copy.code !== 0 && !options?.allowNonZeroExit) {
      throw new CommandError(cmd, copy);
    }
    return copy;
  }

  commands(): string[] {
    return this.calls.map((c) => c.cmd.join(" "));
  }
}
