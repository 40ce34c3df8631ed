import type { TerminalInjector } from "../../../core/ports/desktop.types";
import { InjectionError, errorMessage } from "../../../core/errors";
import { runProcess } from "../../runtime/runtime-process/runtime-process";
import type { ProcessRunResult, ProcessRunner } from "../../runtime/runtime-process/runtime-process.types";
import { currentSessionScript, namedSessionScript } from "../applescript.utils";

export type InjectorOptions = {
  timeoutMs: number;
  run?: ProcessRunner;
};

function outcome(path: string, result: ProcessRunResult): string {
  if (result.timedOut) {
    throw new InjectionError(path, "timed out");
  }
  if (result.code !== 0) {
    throw new InjectionError(path, result.stderr.trim().slice(0, 200) || `exited with ${result.code}`);
  }
  return result.stdout.trim();
}

async function runScript(path: string, script: string, options: InjectorOptions): Promise<string> {
  const run = options.run ?? runProcess;
  let result: ProcessRunResult;
  try {
    result = await run(["osascript", "-e", script], { timeoutMs: options.timeoutMs });
  } catch (error) {
    throw new InjectionError(path, errorMessage(error));
  }
  return outcome(path, result);
}

/** Writes into the first iTerm2 session whose name contains `sessionMatch` (case-insensitive). */
export function createNamedSessionInjector(sessionMatch: string, options: InjectorOptions): TerminalInjector {
  const name = `iterm-session:${sessionMatch}`;
  return {
    name,
    inject: (text) => runScript(name, namedSessionScript(sessionMatch, text), options),
  };
}

export function createCurrentSessionInjector(options: InjectorOptions): TerminalInjector {
  const name = "iterm-current-session";
  return {
    name,
    inject: (text) => runScript(name, currentSessionScript(text), options),
  };
}

/** Runs a user-supplied command with the text appended as its last argument. */
export function createCommandInjector(command: string, options: InjectorOptions): TerminalInjector {
  const argv = command.split(/\s+/).filter((part) => part.length > 0);
  const name = `command:${argv[0] ?? ""}`;
  const run = options.run ?? runProcess;

  return {
    name,
    async inject(text) {
      if (argv.length === 0) {
        throw new InjectionError(name, "empty injection command");
      }
      let result: ProcessRunResult;
      try {
        result = await run([...argv, text], { timeoutMs: options.timeoutMs });
      } catch (error) {
        throw new InjectionError(name, errorMessage(error));
      }
      return outcome(name, result);
    },
  };
}
