import type { ChatMessage } from "../domain/message.types";

export type ListMessagesQuery = {
  limit: number;
  after?: string;
};

export type CreateMessageInput = {
  content: string;
  replyToId?: string;
};

/** Channel-scoped chat API. Implementations reject with `AuthError` or `NetworkError`. */
export interface ChatClient {
  listMessages(query: ListMessagesQuery): Promise<ChatMessage[]>;
  createMessage(input: CreateMessageInput): Promise<ChatMessage>;
  deleteMessage(messageId: string): Promise<void>;
}
