import { Effect, Either } from "effect";
import { logger } from "../../../infra/logger";
import { RateLimitedError, SendError, errorMessage, type RelayError } from "../../errors";
import { attempt, storageFailure } from "../effect.utils";
import { ChatClientService, ClockService, StateStoreService } from "../services.types";
import type { SendOptions, SendReceipt } from "./outbound-gate.types";

export const LAST_SEND_MARKER = "last-send";

export function parseLastSend(raw: string | undefined): number | undefined {
  const value = raw?.trim();
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Seconds left before the next send is allowed; zero or less means the gate is open. */
export function remainingWaitSeconds(lastSendUnixSeconds: number | undefined, nowUnixSeconds: number, intervalSeconds: number): number {
  if (lastSendUnixSeconds === undefined) {
    return 0;
  }
  return intervalSeconds - (nowUnixSeconds - lastSendUnixSeconds);
}

export function sendThroughGate(options: SendOptions): Effect.Effect<SendReceipt, RelayError, ChatClientService | StateStoreService | ClockService> {
  return Effect.gen(function* () {
    const chat = yield* ChatClientService;
    const store = yield* StateStoreService;
    const clock = yield* ClockService;

    if (!options.content.trim()) {
      return yield* Effect.fail(new SendError("message body is empty"));
    }

    if (!options.force) {
      const raw = yield* attempt(() => store.read(LAST_SEND_MARKER), storageFailure(LAST_SEND_MARKER));
      const lastSend = parseLastSend(raw);
      if (raw?.trim() && lastSend === undefined) {
        logger.warn({ value: raw }, "[relay] Ignoring malformed last-send marker.");
      }
      const remaining = remainingWaitSeconds(lastSend, clock.nowUnixSeconds(), options.intervalSeconds);
      if (remaining > 0) {
        logger.info({ remainingSeconds: remaining }, "[relay] Outbound send refused by rate gate.");
        return yield* Effect.fail(new RateLimitedError(remaining));
      }
    }

    const message = yield* Effect.tryPromise({
      try: () =>
        chat.createMessage({
          content: options.content,
          ...(options.replyToId ? { replyToId: options.replyToId } : {}),
        }),
      catch: (error) => new SendError(errorMessage(error), { cause: error }),
    });

    const sentAtUnixSeconds = clock.nowUnixSeconds();
    // marker failures after delivery are not fatal
    const marked = yield* Effect.either(
      attempt(() => store.write(LAST_SEND_MARKER, String(sentAtUnixSeconds)), storageFailure(LAST_SEND_MARKER)),
    );
    const markerSaved = Either.isRight(marked);
    if (Either.isLeft(marked)) {
      logger.warn({ messageId: message.id, error: marked.left.message }, "[relay] Could not record the send time.");
    }

    logger.info(
      { messageId: message.id, replyToId: options.replyToId, forced: options.force },
      "[relay] Outbound message sent.",
    );

    return { message, forced: options.force, sentAtUnixSeconds, markerSaved };
  });
}
