import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import { ConfigurationError, NetworkError, errorMessage, type RelayError } from "../../errors";
import { toChronological } from "../../domain/message.utils";
import { attempt } from "../effect.utils";
import { ChatClientService } from "../services.types";

export type CleanupOptions = {
  count: number;
  pageSize: number;
  selfId?: string;
};

export type CleanupReport = {
  deleted: string[];
  failed: string[];
};

export function deleteMessage(messageId: string): Effect.Effect<void, RelayError, ChatClientService> {
  return Effect.gen(function* () {
    const chat = yield* ChatClientService;
    yield* attempt(
      () => chat.deleteMessage(messageId),
      (error) => new NetworkError(errorMessage(error), undefined, { cause: error }),
    );
    logger.info({ messageId }, "[relay] Message deleted.");
  });
}

/** Deletes the relay's own most recent messages, newest first. A failed delete is reported, not fatal. */
export function cleanupOwnMessages(options: CleanupOptions): Effect.Effect<CleanupReport, RelayError, ChatClientService> {
  return Effect.gen(function* () {
    const selfId = options.selfId;
    if (!selfId) {
      return yield* Effect.fail(
        new ConfigurationError("Own account id is required to identify the relay's messages.", "DISCORD_BOT_ID"),
      );
    }

    const chat = yield* ChatClientService;
    const page = yield* attempt(
      () => chat.listMessages({ limit: options.pageSize }),
      (error) => new NetworkError(errorMessage(error), undefined, { cause: error }),
    );
    const own = toChronological(page.filter((message) => message.author.id === selfId))
      .reverse()
      .slice(0, options.count);

    const report: CleanupReport = { deleted: [], failed: [] };
    for (const message of own) {
      const removed = yield* Effect.promise(() =>
        chat.deleteMessage(message.id).then(
          () => true,
          (error: unknown) => {
            logger.warn({ messageId: message.id, error: errorMessage(error) }, "[relay] Failed to delete message.");
            return false;
          },
        ),
      );
      (removed ? report.deleted : report.failed).push(message.id);
    }

    logger.info({ deleted: report.deleted.length, failed: report.failed.length }, "[relay] Cleanup finished.");
    return report;
  });
}
