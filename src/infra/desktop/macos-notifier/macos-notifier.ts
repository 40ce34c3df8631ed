import type { DesktopNotifier } from "../../../core/ports/desktop.types";
import { runProcess } from "../../runtime/runtime-process/runtime-process";
import type { ProcessRunner } from "../../runtime/runtime-process/runtime-process.types";
import { notificationScript } from "../applescript.utils";

export type MacosNotifierOptions = {
  timeoutMs: number;
  run?: ProcessRunner;
};

export function createMacosNotifier(options: MacosNotifierOptions): DesktopNotifier {
  const run = options.run ?? runProcess;

  return {
    async notify(notification) {
      const result = await run(["osascript", "-e", notificationScript(notification)], { timeoutMs: options.timeoutMs });
      if (result.code !== 0) {
        throw new Error(`osascript exited with ${result.code}: ${result.stderr.trim() || "no output"}`);
      }
    },
  };
}
