import { Effect } from "effect";
import type { RelayError } from "../../errors";
import type { AllowlistEntry, Interaction } from "../../domain/message.types";
import { attempt, storageFailure } from "../effect.utils";
import { checkInteractions } from "../interactions/interactions";
import { ChatClientService, ClockService, StateStoreService } from "../services.types";

export const TOOL_COUNTER_MARKER = "tool-counter";

export type HookEvent = "session-start" | "post-tool-use";

export type HookOptions = {
  allowlist: AllowlistEntry[];
  pageSize: number;
  checkEvery: number;
  sessionStartSinceMinutes: number;
  postToolUseSinceMinutes: number;
  selfId?: string;
};

export type HookResult = {
  event: HookEvent;
  checked: boolean;
  toolCount?: number;
  pending: Interaction[];
};

export function parseToolCount(raw: string | undefined): number {
  const parsed = Number.parseInt(raw?.trim() ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export function runHook(
  event: HookEvent,
  options: HookOptions,
): Effect.Effect<HookResult, RelayError, ChatClientService | StateStoreService | ClockService> {
  return Effect.gen(function* () {
    const common = {
      allowlist: options.allowlist,
      pageSize: options.pageSize,
      markRead: true,
      ...(options.selfId ? { selfId: options.selfId } : {}),
    };

    if (event === "session-start") {
      const pending = yield* checkInteractions({ ...common, sinceMinutes: options.sessionStartSinceMinutes });
      const result: HookResult = { event, checked: true, pending };
      return result;
    }

    // post-tool-use runs after every tool call; only every Nth call reaches the API.
    const store = yield* StateStoreService;
    const raw = yield* attempt(() => store.read(TOOL_COUNTER_MARKER), storageFailure(TOOL_COUNTER_MARKER));
    const toolCount = parseToolCount(raw) + 1;
    yield* attempt(() => store.write(TOOL_COUNTER_MARKER, String(toolCount)), storageFailure(TOOL_COUNTER_MARKER));

    if (toolCount % options.checkEvery !== 0) {
      const skipped: HookResult = { event, checked: false, toolCount, pending: [] };
      return skipped;
    }

    const pending = yield* checkInteractions({ ...common, sinceMinutes: options.postToolUseSinceMinutes });
    const result: HookResult = { event, checked: true, toolCount, pending };
    return result;
  });
}
