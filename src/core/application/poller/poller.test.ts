import { describe, expect, it } from "vitest";
import { NetworkError } from "../../errors";
import { chatMessage, createFakeRelay } from "../../../../test/support/relay-fakes";
import { formatActivityLine } from "../activity/activity";
import { runRelayProgram } from "../effect.utils";
import { pollOnce } from "./poller";
import type { PollOptions } from "./poller.types";

const options: PollOptions = {
  pageSize: 10,
  source: "Discord",
  previewChars: 80,
  notify: true,
  inject: true,
  notificationSound: "Ping",
};

describe("poller", () => {
  it("records an empty pass", async () => {
    const relay = createFakeRelay();

    const outcome = await runRelayProgram(pollOnce(options), relay.services);

    expect(outcome).toEqual({ kind: "empty" });
    expect(relay.activityLog.lines).toEqual([formatActivityLine(relay.clock.now(), "no new messages")]);
  });

  it("advances past automated-only pages without surfacing them", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("5", { automated: true }), chatMessage("6", { automated: true })] });

    const outcome = await runRelayProgram(pollOnce(options), relay.services);

    expect(outcome).toEqual({ kind: "automated-only", fetchedCount: 2, cursor: "6" });
    expect(relay.notifier.sent).toEqual([]);
    expect(relay.activityLog.lines).toEqual([formatActivityLine(relay.clock.now(), "2 bot msgs only")]);
  });

  it("delivers human messages and moves the watchdog cursor", async () => {
    const relay = createFakeRelay({
      messages: [chatMessage("3", { content: "yo" }), chatMessage("4", { content: "hi" }), chatMessage("5", { automated: true })],
    });

    const outcome = await runRelayProgram(pollOnce(options), relay.services);

    expect(outcome.kind).toBe("delivered");
    if (outcome.kind === "delivered") {
      expect(outcome.cursor).toBe("5");
      expect(outcome.messages.map((message) => message.id)).toEqual(["3", "4"]);
    }
    expect(relay.store.values.get("watchdog-cursor")).toBe("5");
    expect(relay.primary.texts).toEqual(["[Discord from alice]: hi"]);
  });

  it("delivers nothing twice", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("3")] });

    await runRelayProgram(pollOnce(options), relay.services);
    const second = await runRelayProgram(pollOnce(options), relay.services);

    expect(second).toEqual({ kind: "empty" });
    expect(relay.primary.texts).toHaveLength(1);
  });

  it("logs fetch errors to the activity log and fails", async () => {
    const relay = createFakeRelay({ state: { "watchdog-cursor": "2" } });
    relay.chat.failNextList = new NetworkError("timed out");

    await expect(runRelayProgram(pollOnce(options), relay.services)).rejects.toThrow("timed out");
    expect(relay.activityLog.lines).toEqual([formatActivityLine(relay.clock.now(), "ERROR: timed out")]);
    expect(relay.store.values.get("watchdog-cursor")).toBe("2");
  });
});
