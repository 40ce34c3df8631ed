import type { ChatMessage } from "../../core/domain/message.types";
import { AuthError, NetworkError, errorMessage, type RelayError } from "../../core/errors";
import type { DiscordMessagePayload } from "./discord.schema";

export function toChatMessage(payload: DiscordMessagePayload): ChatMessage {
  return {
    id: payload.id,
    author: {
      id: payload.author.id,
      username: payload.author.username,
      ...(payload.author.global_name ? { displayName: payload.author.global_name } : {}),
      automated: payload.author.bot ?? false,
    },
    content: payload.content,
    createdAt: payload.timestamp,
  };
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/** `DiscordAPIError` and `HTTPError` both expose the HTTP status; fetch failures and timeouts carry none. */
export function toTransportError(error: unknown, action: string): RelayError {
  const status = statusOf(error);
  const message = `${action}: ${errorMessage(error)}`;
  if (status === 401 || status === 403) {
    return new AuthError(status, message, { cause: error });
  }
  return new NetworkError(message, status, { cause: error });
}
