import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import { NetworkError, errorMessage, type RelayError } from "../../errors";
import { isHumanMessage, toChronological } from "../../domain/message.utils";
import { maxSnowflake } from "../../domain/snowflake.utils";
import { advanceCursor, readCursor } from "../cursor/cursor";
import { attempt } from "../effect.utils";
import { ChatClientService, StateStoreService } from "../services.types";
import type { FetchOptions, FetchResult } from "./message-fetcher.types";

/**
 * Lists the messages newer than the stored cursor and moves the cursor to the newest one.
 *
 * The cursor advances even when the page holds only automated messages, otherwise the same
 * page would be fetched on every run. A failed request leaves the cursor where it was.
 */
export function fetchNewMessages(options: FetchOptions): Effect.Effect<FetchResult, RelayError, ChatClientService | StateStoreService> {
  return Effect.gen(function* () {
    const chat = yield* ChatClientService;
    const previousCursor = yield* readCursor(options.marker);

    const page = yield* attempt(
      () => chat.listMessages({ limit: options.pageSize, ...(previousCursor ? { after: previousCursor } : {}) }),
      (error) => new NetworkError(errorMessage(error), undefined, { cause: error }),
    );

    if (page.length === 0) {
      logger.debug({ marker: options.marker, cursor: previousCursor }, "[relay] No messages after cursor.");
      return {
        fetchedCount: 0,
        ...(previousCursor ? { previousCursor, cursor: previousCursor } : {}),
        humans: [],
      };
    }

    const newest = maxSnowflake(page.map((message) => message.id));
    const cursor = newest ? yield* advanceCursor(options.marker, newest) : previousCursor;
    const humans = toChronological(page.filter((message) => isHumanMessage(message, options.selfId)));

    logger.info(
      { marker: options.marker, fetched: page.length, humans: humans.length, cursor },
      "[relay] Fetched messages after cursor.",
    );

    return {
      fetchedCount: page.length,
      ...(previousCursor ? { previousCursor } : {}),
      ...(cursor ? { cursor } : {}),
      humans,
    };
  });
}
