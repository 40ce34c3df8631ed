import { Effect } from "effect";
import { NetworkError, errorMessage, type RelayError } from "../../errors";
import type { ChatMessage } from "../../domain/message.types";
import { authorName, isHumanMessage, isNewerThan, sinceCutoff, toChronological } from "../../domain/message.utils";
import { maxSnowflake } from "../../domain/snowflake.utils";
import type { ListMessagesQuery } from "../../ports/chat-client.types";
import { advanceCursor, readCursor } from "../cursor/cursor";
import { attempt } from "../effect.utils";
import { ChatClientService, ClockService, StateStoreService } from "../services.types";

export const READ_CURSOR_MARKER = "read-cursor";

export type ReadRecentOptions = {
  pageSize: number;
  sinceMinutes?: number;
  includeAutomated: boolean;
  selfId?: string;
};

export type ReadUnreadOptions = {
  pageSize: number;
  initialPageSize: number;
  selfId?: string;
};

export type ContextOptions = {
  pageSize: number;
  source: string;
  selfId?: string;
};

function listPage(query: ListMessagesQuery): Effect.Effect<ChatMessage[], RelayError, ChatClientService> {
  return Effect.gen(function* () {
    const chat = yield* ChatClientService;
    return yield* attempt(
      () => chat.listMessages(query),
      (error) => new NetworkError(errorMessage(error), undefined, { cause: error }),
    );
  });
}

export function readRecent(options: ReadRecentOptions): Effect.Effect<ChatMessage[], RelayError, ChatClientService | StateStoreService | ClockService> {
  return Effect.gen(function* () {
    const clock = yield* ClockService;
    const page = yield* listPage({ limit: options.pageSize });

    const sinceMinutes = options.sinceMinutes;
    const windowed = sinceMinutes
      ? page.filter((message) => isNewerThan(message, sinceCutoff(clock.now(), sinceMinutes)))
      : page;
    const visible = toChronological(
      options.includeAutomated ? windowed : windowed.filter((message) => isHumanMessage(message, options.selfId)),
    );

    const last = visible[visible.length - 1];
    if (last) {
      yield* advanceCursor(READ_CURSOR_MARKER, last.id);
    }
    return visible;
  });
}

/** Human messages after the read cursor; the cursor then moves past everything fetched, automated messages included. */
export function readUnread(options: ReadUnreadOptions): Effect.Effect<ChatMessage[], RelayError, ChatClientService | StateStoreService> {
  return Effect.gen(function* () {
    const cursor = yield* readCursor(READ_CURSOR_MARKER);
    const page = yield* listPage(cursor ? { limit: options.pageSize, after: cursor } : { limit: options.initialPageSize });

    const newest = maxSnowflake(page.map((message) => message.id));
    if (newest) {
      yield* advanceCursor(READ_CURSOR_MARKER, newest);
    }
    return toChronological(page.filter((message) => isHumanMessage(message, options.selfId)));
  });
}

export function buildAgentContext(options: ContextOptions): Effect.Effect<string, RelayError, ChatClientService> {
  return Effect.gen(function* () {
    const page = yield* listPage({ limit: options.pageSize });
    const humans = toChronological(page.filter((message) => isHumanMessage(message, options.selfId)));
    if (humans.length === 0) {
      return `No recent ${options.source} messages from humans.`;
    }

    const lines = humans.map((message) => `- ${authorName(message.author)}: ${message.content}`);
    return [`Recent ${options.source} messages:`, "", ...lines].join("\n");
  });
}
