import { format } from "date-fns";
import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import { errorMessage } from "../../errors";
import { ActivityLogService, ClockService } from "../services.types";

export const ACTIVITY_TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

export function formatActivityLine(now: Date, text: string): string {
  return `${format(now, ACTIVITY_TIMESTAMP_FORMAT)} | ${text}`;
}

/** Appends timestamped lines to the activity log. Write failures are logged and never fail the caller. */
export function recordActivity(texts: string[]): Effect.Effect<void, never, ActivityLogService | ClockService> {
  return Effect.gen(function* () {
    if (texts.length === 0) {
      return;
    }
    const activityLog = yield* ActivityLogService;
    const clock = yield* ClockService;
    const now = clock.now();
    const lines = texts.map((text) => formatActivityLine(now, text));

    yield* Effect.promise(() =>
      activityLog.append(lines).catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "[relay] Failed to write activity log.");
      }),
    );
  });
}
