import { REST, Routes } from "discord.js";
import type { ChatClient } from "../../../core/ports/chat-client.types";
import { NetworkError } from "../../../core/errors";
import { logger } from "../../logger";
import { discordMessageListSchema, discordMessageSchema } from "../discord.schema";
import { toChatMessage, toTransportError } from "../discord.utils";

export type DiscordRestClient = {
  get: (route: `/${string}`, options?: { query?: URLSearchParams }) => Promise<unknown>;
  post: (route: `/${string}`, options: { body: unknown }) => Promise<unknown>;
  delete: (route: `/${string}`) => Promise<unknown>;
};

export type DiscordChatClientOptions = {
  channelId: string;
  rest: DiscordRestClient;
};

export function createDiscordRest(token: string, timeoutMs: number): DiscordRestClient {
  // Retrying is left to the next scheduled run.
  return new REST({ version: "10", timeout: timeoutMs, retries: 0 }).setToken(token);
}

export function createDiscordChatClient(options: DiscordChatClientOptions): ChatClient {
  const { channelId, rest } = options;

  return {
    async listMessages(query) {
      const params = new URLSearchParams({ limit: String(query.limit) });
      if (query.after) {
        params.set("after", query.after);
      }

      let raw: unknown;
      try {
        raw = await rest.get(Routes.channelMessages(channelId), { query: params });
      } catch (error) {
        throw toTransportError(error, "list messages");
      }

      const parsed = discordMessageListSchema.safeParse(raw);
      if (!parsed.success) {
        throw new NetworkError(`list messages: malformed response (${parsed.error.issues[0]?.message ?? "unknown issue"})`);
      }
      logger.debug({ channelId, limit: query.limit, after: query.after, count: parsed.data.length }, "[relay] Discord messages listed.");
      return parsed.data.map(toChatMessage);
    },

    async createMessage(input) {
      const body = {
        content: input.content,
        ...(input.replyToId ? { message_reference: { message_id: input.replyToId } } : {}),
      };

      let raw: unknown;
      try {
        raw = await rest.post(Routes.channelMessages(channelId), { body });
      } catch (error) {
        throw toTransportError(error, "create message");
      }

      const parsed = discordMessageSchema.safeParse(raw);
      if (!parsed.success) {
        throw new NetworkError("create message: malformed response");
      }
      return toChatMessage(parsed.data);
    },

    async deleteMessage(messageId) {
      try {
        await rest.delete(Routes.channelMessage(channelId, messageId));
      } catch (error) {
        throw toTransportError(error, `delete message ${messageId}`);
      }
    },
  };
}
