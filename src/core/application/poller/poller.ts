import { Effect } from "effect";
import type { RelayError } from "../../errors";
import { recordActivity } from "../activity/activity";
import { dispatchHumanMessages } from "../dispatch/dispatch";
import { fetchNewMessages } from "../message-fetcher/message-fetcher";
import type { RelayServices } from "../services.types";
import type { PollOptions, PollOutcome } from "./poller.types";

export const POLL_CURSOR_MARKER = "watchdog-cursor";

/** One scheduled pass: fetch after the watchdog cursor, then surface whatever humans wrote. */
export function pollOnce(options: PollOptions): Effect.Effect<PollOutcome, RelayError, RelayServices> {
  return Effect.gen(function* () {
    const fetched = yield* fetchNewMessages({ marker: POLL_CURSOR_MARKER, pageSize: options.pageSize, selfId: options.selfId }).pipe(
      Effect.tapError((error) => recordActivity([`ERROR: ${error.message}`])),
    );

    if (fetched.fetchedCount === 0) {
      yield* recordActivity(["no new messages"]);
      const empty: PollOutcome = { kind: "empty" };
      return empty;
    }

    if (fetched.humans.length === 0) {
      yield* recordActivity([`${fetched.fetchedCount} bot msgs only`]);
      const automatedOnly: PollOutcome = {
        kind: "automated-only",
        fetchedCount: fetched.fetchedCount,
        ...(fetched.cursor ? { cursor: fetched.cursor } : {}),
      };
      return automatedOnly;
    }

    const report = yield* dispatchHumanMessages(fetched.humans, options);
    const delivered: PollOutcome = {
      kind: "delivered",
      fetchedCount: fetched.fetchedCount,
      ...(fetched.cursor ? { cursor: fetched.cursor } : {}),
      messages: fetched.humans,
      report,
    };
    return delivered;
  });
}
