import { withSudo, type Executor, type ExecResult } from "./executor";

export function buildDownloadCommand(url: string, target: string): string[] {
  // -f turns an HTTP error status into a non-zero exit instead of saving the error page
  return ["curl", "-fL", url, "-o", target];
}

export function downloadBootloader(exec: Executor, url: string, target: string, sudo: boolean): Promise<ExecResult> {
  return exec.run(withSudo(buildDownloadCommand(url, target), sudo), { inherit: true, allowNonZeroExit: true });
}
