import { spawn } from "node:child_process";
import type { ProcessRunOptions, ProcessRunResult } from "./runtime-process.types";

export async function runProcess(argv: string[], options?: ProcessRunOptions): Promise<ProcessRunResult> {
  const timeoutMs = options?.timeoutMs ?? 0;

  return await new Promise<ProcessRunResult>((resolveResult, rejectResult) => {
    const command = argv[0];
    if (!command) {
      rejectResult(new Error("No command provided to runProcess"));
      return;
    }

    const child = spawn(command, argv.slice(1), {
      cwd: options?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : undefined;

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });
    child.on("error", (error) => {
      if (timer) {
        clearTimeout(timer);
      }
      rejectResult(error);
    });
    child.on("close", (code) => {
      if (timer) {
        clearTimeout(timer);
      }
      resolveResult({
        code: code ?? (timedOut ? 124 : 0),
        stdout,
        stderr,
        timedOut,
      });
    });
  });
}
