export type StateMarker = "watchdog-cursor" | "read-cursor" | "interaction-cursor" | "last-send" | "tool-counter";

export interface StateStore {
  read(marker: StateMarker): Promise<string | undefined>;
  write(marker: StateMarker, value: string): Promise<void>;
}
