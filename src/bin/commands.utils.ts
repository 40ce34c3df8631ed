import { resolve } from "node:path";
import { z } from "zod";
import { cleanupOwnMessages, deleteMessage } from "../core/application/cleanup/cleanup";
import { runRelayProgram } from "../core/application/effect.utils";
import { runHook, type HookEvent } from "../core/application/hooks/hooks";
import { checkInteractions } from "../core/application/interactions/interactions";
import { sendThroughGate } from "../core/application/outbound-gate/outbound-gate";
import { pollOnce } from "../core/application/poller/poller";
import type { PollOutcome } from "../core/application/poller/poller.types";
import { buildAgentContext, readRecent, readUnread } from "../core/application/reader/reader";
import type { RelayServiceImpls } from "../core/application/services.types";
import { runWatchLoop } from "../core/application/watch/watch";
import { ConfigurationError, RateLimitedError, errorMessage } from "../core/errors";
import type { RelayConfig } from "../infra/config";
import { renderAllowlist, renderInteractions, renderMessageList } from "./output.utils";

export const CLI_NAME = "discord-relay";

export type CommandContext = {
  config: RelayConfig;
  services: RelayServiceImpls;
};

export type CliFailure = {
  output: string;
  exitCode: number;
};

const hookEventSchema = z.enum(["session-start", "post-tool-use"]);

export function parsePositiveInt(value: unknown, name: string): number | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number.parseInt(String(value), 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid ${name}: ${String(value)}`);
  }
  return parsed;
}

export function parseHookEvent(value: string): HookEvent {
  const parsed = hookEventSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown hook event: ${value}. Use one of: ${hookEventSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

/** A refused send is an answer, not a crash. */
export function describeFailure(error: unknown): CliFailure {
  if (error instanceof RateLimitedError) {
    return { output: error.message, exitCode: 0 };
  }
  return { output: `Error: ${errorMessage(error)}`, exitCode: 1 };
}

export async function readCommand(ctx: CommandContext, options: { sinceMinutes?: number; all: boolean }): Promise<string> {
  const messages = await runRelayProgram(
    readRecent({
      pageSize: ctx.config.read.pageSize,
      includeAutomated: options.all,
      ...(options.sinceMinutes ? { sinceMinutes: options.sinceMinutes } : {}),
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
  if (messages.length === 0) {
    return "No messages found.";
  }
  return renderMessageList(`${ctx.config.poll.source} Messages`, messages, ctx.config.read.contentChars);
}

export async function unreadCommand(ctx: CommandContext): Promise<string> {
  const messages = await runRelayProgram(
    readUnread({
      pageSize: ctx.config.read.pageSize,
      initialPageSize: ctx.config.read.unreadPageSize,
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
  if (messages.length === 0) {
    return "No new messages.";
  }
  return renderMessageList(`New ${ctx.config.poll.source} Messages`, messages, ctx.config.read.contentChars);
}

export async function sendCommand(
  ctx: CommandContext,
  options: { content: string; force: boolean; replyToId?: string },
): Promise<string> {
  const receipt = await runRelayProgram(
    sendThroughGate({
      content: options.content,
      force: options.force,
      intervalSeconds: ctx.config.rateLimitSeconds,
      ...(options.replyToId ? { replyToId: options.replyToId } : {}),
    }),
    ctx.services,
  );
  const summary = options.replyToId
    ? `Replied to message ${options.replyToId} (id: ${receipt.message.id})`
    : `Message sent (id: ${receipt.message.id})`;
  return receipt.markerSaved ? summary : `${summary}\nWarning: send time not recorded, the rate limit is not enforced for the next send`;
}

export async function interactionsCommand(
  ctx: CommandContext,
  options: { sinceMinutes?: number; json: boolean; mark: boolean },
): Promise<string> {
  const pending = await runRelayProgram(
    checkInteractions({
      allowlist: ctx.config.allowlist,
      sinceMinutes: options.sinceMinutes ?? ctx.config.hooks.sessionStartSinceMinutes,
      markRead: options.mark,
      pageSize: ctx.config.read.pageSize,
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
  return options.json ? JSON.stringify(pending, null, 2) : renderInteractions(pending);
}

export async function cleanupCommand(ctx: CommandContext, count: number): Promise<string> {
  const report = await runRelayProgram(
    cleanupOwnMessages({
      count,
      pageSize: ctx.config.read.pageSize,
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
  if (report.deleted.length === 0 && report.failed.length === 0) {
    return "No bot messages to delete";
  }
  const lines = [`Deleted ${report.deleted.length} bot messages`];
  if (report.failed.length > 0) {
    lines.push(`Failed to delete: ${report.failed.join(", ")}`);
  }
  return lines.join("\n");
}

export async function deleteCommand(ctx: CommandContext, messageId: string): Promise<string> {
  await runRelayProgram(deleteMessage(messageId), ctx.services);
  return `Message ${messageId} deleted`;
}

export function usersCommand(config: RelayConfig): string {
  return renderAllowlist(config.allowlist);
}

export async function contextCommand(ctx: CommandContext): Promise<string> {
  return await runRelayProgram(
    buildAgentContext({
      pageSize: ctx.config.read.contextPageSize,
      source: ctx.config.poll.source,
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
}

export function describePoll(outcome: PollOutcome): string {
  switch (outcome.kind) {
    case "empty":
      return "No new messages.";
    case "automated-only":
      return `${outcome.fetchedCount} bot messages only.`;
    case "delivered":
      return `${outcome.messages.length} new message(s) from humans (injection: ${outcome.report.injection.status}).`;
  }
}

export async function pollCommand(ctx: CommandContext): Promise<string> {
  const outcome = await runRelayProgram(
    pollOnce({
      pageSize: ctx.config.poll.pageSize,
      source: ctx.config.poll.source,
      previewChars: ctx.config.poll.previewChars,
      notify: ctx.config.desktop.notify,
      inject: ctx.config.desktop.inject,
      ...(ctx.config.poll.notificationSound ? { notificationSound: ctx.config.poll.notificationSound } : {}),
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );
  return describePoll(outcome);
}

export async function hookCommand(ctx: CommandContext, event: HookEvent): Promise<string> {
  const result = await runRelayProgram(
    runHook(event, {
      allowlist: ctx.config.allowlist,
      pageSize: ctx.config.read.pageSize,
      checkEvery: ctx.config.hooks.checkEvery,
      sessionStartSinceMinutes: ctx.config.hooks.sessionStartSinceMinutes,
      postToolUseSinceMinutes: ctx.config.hooks.postToolUseSinceMinutes,
      ...(ctx.config.discord.botId ? { selfId: ctx.config.discord.botId } : {}),
    }),
    ctx.services,
  );

  if (result.event === "session-start") {
    return renderInteractions(result.pending);
  }
  if (result.pending.length === 0) {
    return "";
  }
  return `New ${ctx.config.poll.source} messages found - run: ${CLI_NAME} read --since ${ctx.config.hooks.postToolUseSinceMinutes}`;
}

export async function watchCommand(
  ctx: CommandContext,
  options: { intervalSeconds: number; signal: AbortSignal; write: (text: string) => void },
): Promise<number> {
  options.write(`Watching for new messages (every ${options.intervalSeconds}s)...\nPress Ctrl+C to stop.\n`);
  return await runWatchLoop({
    intervalMs: options.intervalSeconds * 1000,
    signal: options.signal,
    tick: async () => {
      const output = await unreadCommand(ctx);
      if (output !== "No new messages.") {
        options.write(output);
      }
    },
  });
}

export function doctorReport(config: RelayConfig, env: NodeJS.ProcessEnv): string {
  return [
    "discord-relay diagnostics",
    `- Bot token configured: ${config.discord.token ? "yes" : "no"}`,
    `- Channel id: ${config.discord.channelId || "not set"}`,
    `- Own account id: ${config.discord.botId || "not set (cleanup disabled)"}`,
    `- Allowed users: ${config.allowlist.length === 0 ? "all" : config.allowlist.map((entry) => entry.label).join(", ")}`,
    `- Rate limit: ${config.rateLimitSeconds}s`,
    `- Request timeout: ${config.discord.requestTimeoutMs}ms`,
    `- State dir: ${config.paths.stateDir}`,
    `- Flag file: ${config.paths.flagPath}`,
    `- Activity log: ${config.paths.activityLogPath} (last ${config.poll.activityLogMaxLines} lines)`,
    `- Notifications: ${config.desktop.notify ? "enabled" : "disabled"}`,
    `- Injection: ${config.desktop.inject ? (config.desktop.injectCommand ? `command "${config.desktop.injectCommand}"` : `iTerm2 session matching "${config.desktop.injectSessionMatch}"`) : "disabled"}`,
    `- File logging enabled: ${env.RELAY_LOG_TO_FILE === "0" ? "no" : "yes"}`,
    `- Log file path: ${env.RELAY_LOG_FILE || resolve(config.paths.configDir, "discord-relay.log")}`,
  ].join("\n");
}
