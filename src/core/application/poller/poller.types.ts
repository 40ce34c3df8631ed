import type { ChatMessage } from "../../domain/message.types";
import type { DispatchOptions, DispatchReport } from "../dispatch/dispatch.types";

export type PollOptions = DispatchOptions & {
  pageSize: number;
  selfId?: string;
};

export type PollOutcome =
  | { kind: "empty" }
  | { kind: "automated-only"; fetchedCount: number; cursor?: string }
  | { kind: "delivered"; fetchedCount: number; cursor?: string; messages: ChatMessage[]; report: DispatchReport };
