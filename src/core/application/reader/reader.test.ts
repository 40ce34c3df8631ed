import { describe, expect, it } from "vitest";
import { chatMessage, createFakeRelay } from "../../../../test/support/relay-fakes";
import { runRelayProgram } from "../effect.utils";
import { buildAgentContext, readRecent, readUnread } from "./reader";

const NOW = "2026-05-06T07:30:00.000Z";

function channel() {
  return [
    chatMessage("1", { createdAt: "2026-05-06T06:00:00.000000+00:00", content: "morning" }),
    chatMessage("2", { createdAt: "2026-05-06T07:20:00.000000+00:00", content: "status?" }),
    chatMessage("3", { automated: true, createdAt: "2026-05-06T07:25:00.000000+00:00", content: "all green" }),
  ];
}

describe("reader", () => {
  it("reads recent human messages and moves the read cursor", async () => {
    const relay = createFakeRelay({ messages: channel(), now: NOW });

    const messages = await runRelayProgram(readRecent({ pageSize: 50, includeAutomated: false }), relay.services);

    expect(messages.map((message) => message.id)).toEqual(["1", "2"]);
    expect(relay.chat.queries).toEqual([{ limit: 50 }]);
    expect(relay.store.values.get("read-cursor")).toBe("2");
  });

  it("filters by age and includes automated authors on request", async () => {
    const relay = createFakeRelay({ messages: channel(), now: NOW });

    const messages = await runRelayProgram(
      readRecent({ pageSize: 50, sinceMinutes: 30, includeAutomated: true }),
      relay.services,
    );

    expect(messages.map((message) => message.id)).toEqual(["2", "3"]);
    expect(relay.store.values.get("read-cursor")).toBe("3");
  });

  it("starts unread from the latest page without a cursor", async () => {
    const relay = createFakeRelay({ messages: channel(), now: NOW });

    const messages = await runRelayProgram(readUnread({ pageSize: 50, initialPageSize: 10 }), relay.services);

    expect(relay.chat.queries).toEqual([{ limit: 10 }]);
    expect(messages.map((message) => message.id)).toEqual(["1", "2"]);
    expect(relay.store.values.get("read-cursor")).toBe("3");
  });

  it("continues unread after the cursor", async () => {
    const relay = createFakeRelay({ messages: channel(), now: NOW, state: { "read-cursor": "1" } });

    const first = await runRelayProgram(readUnread({ pageSize: 50, initialPageSize: 10 }), relay.services);
    const second = await runRelayProgram(readUnread({ pageSize: 50, initialPageSize: 10 }), relay.services);

    expect(relay.chat.queries).toEqual([
      { limit: 50, after: "1" },
      { limit: 50, after: "3" },
    ]);
    expect(first.map((message) => message.id)).toEqual(["2"]);
    expect(second).toEqual([]);
  });

  it("formats context for the assistant", async () => {
    const relay = createFakeRelay({ messages: channel(), now: NOW });

    const context = await runRelayProgram(buildAgentContext({ pageSize: 20, source: "Discord" }), relay.services);

    expect(context).toBe("Recent Discord messages:\n\n- alice: morning\n- alice: status?");
  });

  it("says so when no human wrote anything", async () => {
    const relay = createFakeRelay({ messages: [chatMessage("3", { automated: true })], now: NOW });

    const context = await runRelayProgram(buildAgentContext({ pageSize: 20, source: "Discord" }), relay.services);

    expect(context).toBe("No recent Discord messages from humans.");
  });
});
