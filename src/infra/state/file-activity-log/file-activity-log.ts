import type { ActivityLog, MessageFlag } from "../../../core/ports/activity-log.types";
import { appendTextFile, readOptionalTextFile, writeTextFile, writeTextFileAtomic } from "../../runtime/runtime-fs/runtime-fs";

export function keepLastLines(text: string, maxLines: number): string | undefined {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  if (lines.length <= maxLines) {
    return undefined;
  }
  return `${lines.slice(-maxLines).join("\n")}\n`;
}

/** Append-only log capped at `maxLines`; older lines are dropped after each append. */
export function createFileActivityLog(path: string, maxLines: number): ActivityLog {
  return {
    async append(lines) {
      if (lines.length === 0) {
        return;
      }
      await appendTextFile(path, `${lines.join("\n")}\n`);

      const current = await readOptionalTextFile(path);
      const trimmed = current === undefined ? undefined : keepLastLines(current, maxLines);
      if (trimmed !== undefined) {
        await writeTextFileAtomic(path, trimmed);
      }
    },
  };
}

export function createFileMessageFlag(path: string): MessageFlag {
  return {
    async write(text) {
      await writeTextFile(path, text);
    },
  };
}
