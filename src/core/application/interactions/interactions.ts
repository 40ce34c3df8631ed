import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import { NetworkError, errorMessage, type RelayError } from "../../errors";
import { filterAllowed, toInteraction } from "../../domain/allowlist.utils";
import type { AllowlistEntry, Interaction } from "../../domain/message.types";
import { isHumanMessage, isNewerThan, sinceCutoff, toChronological } from "../../domain/message.utils";
import { advanceCursor, readCursor } from "../cursor/cursor";
import { attempt } from "../effect.utils";
import { ChatClientService, ClockService, StateStoreService } from "../services.types";

export const INTERACTION_CURSOR_MARKER = "interaction-cursor";

export type InteractionsOptions = {
  allowlist: AllowlistEntry[];
  sinceMinutes: number;
  markRead: boolean;
  pageSize: number;
  selfId?: string;
};

/**
 * Messages from allowlisted humans that arrived after the interaction cursor.
 * Without a cursor the window is the last `sinceMinutes` minutes.
 */
export function checkInteractions(
  options: InteractionsOptions,
): Effect.Effect<Interaction[], RelayError, ChatClientService | StateStoreService | ClockService> {
  return Effect.gen(function* () {
    const chat = yield* ChatClientService;
    const clock = yield* ClockService;
    const cursor = yield* readCursor(INTERACTION_CURSOR_MARKER);

    const page = yield* attempt(
      () => chat.listMessages({ limit: options.pageSize, ...(cursor ? { after: cursor } : {}) }),
      (error) => new NetworkError(errorMessage(error), undefined, { cause: error }),
    );

    const cutoff = sinceCutoff(clock.now(), options.sinceMinutes);
    const windowed = !cursor && options.sinceMinutes > 0 ? page.filter((message) => isNewerThan(message, cutoff)) : page;
    const humans = windowed.filter((message) => isHumanMessage(message, options.selfId));
    const pending = toChronological(filterAllowed(humans, options.allowlist));

    const last = pending[pending.length - 1];
    if (options.markRead && last) {
      yield* advanceCursor(INTERACTION_CURSOR_MARKER, last.id);
    }

    logger.info({ fetched: page.length, pending: pending.length, markRead: options.markRead }, "[relay] Checked pending interactions.");
    return pending.map((message) => toInteraction(options.allowlist, message));
  });
}
