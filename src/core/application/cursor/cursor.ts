import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import type { RelayError } from "../../errors";
import { compareSnowflakes, isSnowflake } from "../../domain/snowflake.utils";
import type { StateMarker } from "../../ports/state-store.types";
import { attempt, storageFailure } from "../effect.utils";
import { StateStoreService } from "../services.types";

export function readCursor(marker: StateMarker): Effect.Effect<string | undefined, RelayError, StateStoreService> {
  return Effect.gen(function* () {
    const store = yield* StateStoreService;
    const raw = yield* attempt(() => store.read(marker), storageFailure(marker));
    const value = raw?.trim();
    if (!value) {
      return undefined;
    }
    if (!isSnowflake(value)) {
      logger.warn({ marker, value }, "[relay] Ignoring malformed cursor value.");
      return undefined;
    }
    return value;
  });
}

/** Moves the cursor forward to `candidate`; a candidate that is not newer than the stored id is dropped. */
export function advanceCursor(marker: StateMarker, candidate: string): Effect.Effect<string, RelayError, StateStoreService> {
  return Effect.gen(function* () {
    const store = yield* StateStoreService;
    const current = yield* readCursor(marker);
    if (current && compareSnowflakes(candidate, current) <= 0) {
      return current;
    }
    yield* attempt(() => store.write(marker, candidate), storageFailure(marker));
    logger.debug({ marker, from: current, to: candidate }, "[relay] Cursor advanced.");
    return candidate;
  });
}
