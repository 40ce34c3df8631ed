import type { ChatMessage } from "../../domain/message.types";
import type { StateMarker } from "../../ports/state-store.types";

export type FetchOptions = {
  marker: StateMarker;
  pageSize: number;
  selfId?: string;
};

export type FetchResult = {
  fetchedCount: number;
  previousCursor?: string;
  cursor?: string;
  humans: ChatMessage[];
};
