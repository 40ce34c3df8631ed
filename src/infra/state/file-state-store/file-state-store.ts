import { resolve } from "node:path";
import type { StateMarker, StateStore } from "../../../core/ports/state-store.types";
import { readOptionalTextFile, writeTextFileAtomic } from "../../runtime/runtime-fs/runtime-fs";

export const STATE_FILE_NAMES: Record<StateMarker, string> = {
  "watchdog-cursor": "watchdog_cursor",
  "read-cursor": "read_cursor",
  "interaction-cursor": "interaction_cursor",
  "last-send": "last_send",
  "tool-counter": "tool_counter",
};

export function stateFilePath(stateDir: string, marker: StateMarker): string {
  return resolve(stateDir, STATE_FILE_NAMES[marker]);
}

export function createFileStateStore(stateDir: string): StateStore {
  return {
    async read(marker) {
      const text = await readOptionalTextFile(stateFilePath(stateDir, marker));
      const value = text?.trim();
      return value ? value : undefined;
    },
    async write(marker, value) {
      await writeTextFileAtomic(stateFilePath(stateDir, marker), `${value}\n`);
    },
  };
}
