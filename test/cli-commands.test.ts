import { describe, expect, it } from "vitest";
import { ConfigurationError, RateLimitedError } from "@core/errors";
import { buildRelayConfig, fromEnv, type RelayConfig } from "@infra/config";
import {
  cleanupCommand,
  contextCommand,
  deleteCommand,
  describeFailure,
  describePoll,
  doctorReport,
  hookCommand,
  interactionsCommand,
  parseHookEvent,
  parsePositiveInt,
  pollCommand,
  readCommand,
  sendCommand,
  unreadCommand,
  usersCommand,
  watchCommand,
} from "../src/bin/commands.utils";
import { chatMessage, createFakeRelay, type FakeRelay } from "./support/relay-fakes";

const RULE = "=".repeat(60);

function relayConfig(extra?: NodeJS.ProcessEnv): RelayConfig {
  const env: NodeJS.ProcessEnv = {
    HOME: "/tmp/relay-home",
    DISCORD_BOT_TOKEN: "test-token",
    DISCORD_CHANNEL_ID: "555",
    DISCORD_BOT_ID: "900",
    DISCORD_ALLOWED_USERS: "111:Alice",
    ...extra,
  };
  return buildRelayConfig([fromEnv(env)], env);
}

function context(relay: FakeRelay, config: RelayConfig = relayConfig()) {
  return { config, services: relay.services };
}

describe("cli commands", () => {
  it("lists recent messages with a banner", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("1", { content: "hello" }), chatMessage("2", { automated: true })] });

    const output = await readCommand(context(relay), { all: false });

    expect(output).toBe(["", RULE, "Discord Messages", RULE, "", "[USER] [2026-05-06 07:08] alice: hello", ""].join("\n"));
  });

  it("reports empty reads", async () => {
    const relay = createFakeRelay();

    await expect(readCommand(context(relay), { all: true })).resolves.toBe("No messages found.");
    await expect(unreadCommand(context(relay))).resolves.toBe("No new messages.");
  });

  it("sends, then reports the rate gate without failing", async () => {
    const relay = createFakeRelay();
    const ctx = context(relay);

    await expect(sendCommand(ctx, { content: "deploy done", force: false })).resolves.toBe("Message sent (id: 10001)");

    const refused = await sendCommand(ctx, { content: "again", force: false }).catch((error: unknown) => error);
    expect(refused).toBeInstanceOf(RateLimitedError);
    expect(describeFailure(refused)).toEqual({
      output: "Rate limited: wait 300s before sending another message (use --force to bypass)",
      exitCode: 0,
    });

    await expect(sendCommand(ctx, { content: "on it", force: true, replyToId: "42" })).resolves.toBe(
      "Replied to message 42 (id: 10002)",
    );
  });

  it("warns instead of failing when a delivered send cannot be recorded", async () => {
    const relay = createFakeRelay();
    relay.store.failWrites = new Error("EROFS: read-only file system");

    await expect(sendCommand(context(relay), { content: "deploy done", force: false })).resolves.toBe(
      "Message sent (id: 10001)\nWarning: send time not recorded, the rate limit is not enforced for the next send",
    );
    expect(relay.chat.created).toHaveLength(1);
  });

  it("maps other failures to exit code 1", () => {
    expect(describeFailure(new ConfigurationError("Bot token is missing.", "DISCORD_BOT_TOKEN"))).toEqual({
      output: "Error: [DISCORD_BOT_TOKEN] Bot token is missing.",
      exitCode: 1,
    });
  });

  it("prints pending interactions as text or json", async () => {
    const relay = createFakeRelay({
      messages: [chatMessage("7", { content: "ping", createdAt: "2026-05-06T07:20:00.000000+00:00" })],
    });

    const json = await interactionsCommand(context(relay), { json: true, mark: false });
    expect(JSON.parse(json)).toEqual([
      { id: "7", author: "Alice", authorId: "111", content: "ping", timestamp: "2026-05-06 07:20" },
    ]);

    const text = await interactionsCommand(context(relay), { json: false, mark: true });
    expect(text).toBe(["", RULE, "Pending Interactions (1 messages)", RULE, "", "  [2026-05-06 07:20] Alice: ping", ""].join("\n"));

    await expect(interactionsCommand(context(relay), { json: false, mark: true })).resolves.toBe(
      "No pending interactions from allowed users.",
    );
  });

  it("cleans up and deletes messages", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("1", { automated: true }), chatMessage("2")] });

    await expect(cleanupCommand(context(relay), 5)).resolves.toBe("Deleted 1 bot messages");
    await expect(cleanupCommand(context(relay), 5)).resolves.toBe("No bot messages to delete");
    await expect(deleteCommand(context(relay), "2")).resolves.toBe("Message 2 deleted");
  });

  it("lists the allowlist", () => {
    expect(usersCommand(relayConfig())).toBe(["", "Allowed interactive users:", "  Alice (ID: 111)", ""].join("\n"));
    expect(usersCommand(relayConfig({ DISCORD_ALLOWED_USERS: "" }))).toBe(
      ["", "No allowlist configured - all users can interact.", "Set DISCORD_ALLOWED_USERS to restrict access."].join("\n"),
    );
  });

  it("builds the assistant context", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("1", { content: "ship it" })] });

    await expect(contextCommand(context(relay))).resolves.toBe("Recent Discord messages:\n\n- alice: ship it");
  });

  it("summarises a poll pass", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("1", { content: "hello" })] });

    await expect(pollCommand(context(relay))).resolves.toBe("1 new message(s) from humans (injection: injected).");
    await expect(pollCommand(context(relay))).resolves.toBe("No new messages.");
    expect(describePoll({ kind: "automated-only", fetchedCount: 4 })).toBe("4 bot messages only.");
  });

  it("prints a hint from the post-tool-use hook on the Nth call", async () => {
    const relay = createFakeRelay({
      messages: [chatMessage("1", { createdAt: "2026-05-06T07:20:00.000000+00:00" })],
      state: { "tool-counter": "14" },
    });

    await expect(hookCommand(context(relay), "post-tool-use")).resolves.toBe(
      "New Discord messages found - run: discord-relay read --since 30",
    );
    await expect(hookCommand(context(relay), "post-tool-use")).resolves.toBe("");
  });

  it("prints unread messages while watching", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("1", { content: "hello" })] });
    const controller = new AbortController();
    const written: string[] = [];

    const pending = watchCommand(context(relay), {
      intervalSeconds: 1,
      signal: controller.signal,
      write: (text) => {
        written.push(text);
        if (written.length === 2) {
          controller.abort();
        }
      },
    });

    await expect(pending).resolves.toBe(1);
    expect(written[0]).toBe("Watching for new messages (every 1s)...\nPress Ctrl+C to stop.\n");
    expect(written[1]).toContain("[USER] [2026-05-06 07:08] alice: hello");
  });

  it("validates arguments", () => {
    expect(parsePositiveInt(undefined, "count")).toBeUndefined();
    expect(parsePositiveInt("12", "count")).toBe(12);
    expect(parsePositiveInt(7, "count")).toBe(7);
    expect(() => parsePositiveInt("0", "count")).toThrow("Invalid count: 0");
    expect(parseHookEvent("session-start")).toBe("session-start");
    expect(() => parseHookEvent("pre-tool-use")).toThrow("Unknown hook event: pre-tool-use");
  });

  it("reports diagnostics", () => {
    const report = doctorReport(relayConfig({ RELAY_INJECT: "0" }), { RELAY_LOG_TO_FILE: "0" });

    expect(report.split("\n")).toEqual([
      "discord-relay diagnostics",
      "- Bot token configured: yes",
      "- Channel id: 555",
      "- Own account id: 900",
      "- Allowed users: Alice",
      "- Rate limit: 300s",
      "- Request timeout: 10000ms",
      "- State dir: /tmp/relay-home/.config/discord-relay/state",
      expect.stringMatching(/^- Flag file: .*discord_new_message\.flag$/),
      "- Activity log: /tmp/relay-home/.config/discord-relay/state/watchdog.log (last 100 lines)",
      "- Notifications: enabled",
      "- Injection: disabled",
      "- File logging enabled: no",
      "- Log file path: /tmp/relay-home/.config/discord-relay/discord-relay.log",
    ]);
  });
});
