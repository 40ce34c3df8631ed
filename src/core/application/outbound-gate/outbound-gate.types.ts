import type { ChatMessage } from "../../domain/message.types";

export type SendOptions = {
  content: string;
  force: boolean;
  intervalSeconds: number;
  replyToId?: string;
};

export type SendReceipt = {
  message: ChatMessage;
  forced: boolean;
  sentAtUnixSeconds: number;
  markerSaved: boolean;
};
