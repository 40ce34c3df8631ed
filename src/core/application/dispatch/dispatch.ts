import { Effect } from "effect";
import { logger } from "../../../infra/logger";
import { errorMessage } from "../../errors";
import type { ChatMessage } from "../../domain/message.types";
import { authorName, formatFlagLine, formatInjectionText, formatPreview } from "../../domain/message.utils";
import type { TerminalInjector } from "../../ports/desktop.types";
import { recordActivity } from "../activity/activity";
import { ActivityLogService, ClockService, InjectorsService, MessageFlagService, NotifierService } from "../services.types";
import type { DispatchOptions, DispatchReport, InjectionOutcome } from "./dispatch.types";

function bestEffort(task: () => Promise<void>, context: Record<string, unknown>, message: string): Effect.Effect<boolean> {
  return Effect.promise(() =>
    task().then(
      () => true,
      (error: unknown) => {
        logger.warn({ ...context, error: errorMessage(error) }, message);
        return false;
      },
    ),
  );
}

function tryInjector(injector: TerminalInjector, text: string): Effect.Effect<{ ok: true; detail: string } | { ok: false; error: string }> {
  return Effect.promise(() =>
    injector.inject(text).then(
      (detail) => ({ ok: true as const, detail }),
      (error: unknown) => ({ ok: false as const, error: errorMessage(error) }),
    ),
  );
}

export function injectWithFallback(text: string): Effect.Effect<InjectionOutcome, never, InjectorsService> {
  return Effect.gen(function* () {
    const injectors = yield* InjectorsService;

    const primary = yield* tryInjector(injectors.primary, text);
    if (primary.ok) {
      const injected: InjectionOutcome = { status: "injected", via: injectors.primary.name, detail: primary.detail };
      return injected;
    }
    logger.warn({ injector: injectors.primary.name, error: primary.error }, "[relay] Primary injection failed, trying fallback.");

    const fallback = yield* tryInjector(injectors.fallback, text);
    if (fallback.ok) {
      const injected: InjectionOutcome = { status: "injected", via: injectors.fallback.name, detail: fallback.detail };
      return injected;
    }
    logger.error({ injector: injectors.fallback.name, error: fallback.error }, "[relay] Fallback injection failed.");

    const failed: InjectionOutcome = { status: "failed", errors: [primary.error, fallback.error] };
    return failed;
  });
}

function describeInjection(outcome: InjectionOutcome): string {
  switch (outcome.status) {
    case "injected":
      return `INJECTED via ${outcome.via}: ${outcome.detail.slice(0, 100)}`;
    case "failed":
      return `INJECT FAIL (both): ${outcome.errors.map((error) => error.slice(0, 100)).join(" / ")}`;
    case "skipped":
      return "injection disabled, skipping";
  }
}

/**
 * Surfaces a batch of human messages: the whole batch goes to the flag file and the activity log,
 * the most recent message is announced and typed into the terminal. None of these side effects
 * can fail the batch.
 */
export function dispatchHumanMessages(
  messages: ChatMessage[],
  options: DispatchOptions,
): Effect.Effect<
  DispatchReport,
  never,
  NotifierService | InjectorsService | ActivityLogService | MessageFlagService | ClockService
> {
  return Effect.gen(function* () {
    const latest = messages[messages.length - 1];
    if (!latest) {
      const nothing: DispatchReport = { flagged: false, notified: false, injection: { status: "skipped" } };
      return nothing;
    }

    const flag = yield* MessageFlagService;
    const notifier = yield* NotifierService;
    const batchText = messages.map(formatFlagLine).join("\n");

    const flagged = yield* bestEffort(() => flag.write(batchText), { count: messages.length }, "[relay] Failed to write message flag.");

    const notified = options.notify
      ? yield* bestEffort(
          () =>
            notifier.notify({
              title: `${options.source}: ${authorName(latest.author)}`,
              message: formatPreview(latest.content, options.previewChars),
              ...(options.notificationSound ? { sound: options.notificationSound } : {}),
            }),
          { messageId: latest.id },
          "[relay] Desktop notification failed.",
        )
      : false;

    const injection: InjectionOutcome = options.inject
      ? yield* injectWithFallback(formatInjectionText(options.source, latest))
      : { status: "skipped" };

    yield* recordActivity([describeInjection(injection), ...messages.map((message) => `NEW: ${formatFlagLine(message)}`)]);

    logger.info(
      { count: messages.length, latestId: latest.id, notified, injection: injection.status },
      "[relay] Dispatched human messages.",
    );

    const report: DispatchReport = { flagged, notified, injection };
    return report;
  });
}
