import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors";
import { chatMessage, createFakeRelay } from "../../../../test/support/relay-fakes";
import { runRelayProgram } from "../effect.utils";
import { cleanupOwnMessages, deleteMessage } from "./cleanup";

function channel() {
  return [
    chatMessage("1", { automated: true }),
    chatMessage("2"),
    chatMessage("3", { automated: true }),
    chatMessage("4", { automated: true }),
  ];
}

describe("cleanup", () => {
  it("deletes the newest own messages first", async () => {
    const relay = createFakeRelay({ messages: channel() });

    const report = await runRelayProgram(cleanupOwnMessages({ count: 2, pageSize: 50, selfId: "900" }), relay.services);

    expect(report).toEqual({ deleted: ["4", "3"], failed: [] });
    expect(relay.chat.messages.map((message) => message.id)).toEqual(["1", "2"]);
  });

  it("reports failed deletions and carries on", async () => {
    const relay = createFakeRelay({ messages: channel() });
    relay.chat.failDeleteIds.add("4");

    const report = await runRelayProgram(cleanupOwnMessages({ count: 5, pageSize: 50, selfId: "900" }), relay.services);

    expect(report).toEqual({ deleted: ["3", "1"], failed: ["4"] });
  });

  it("requires the relay's own account id", async () => {
    const relay = createFakeRelay({ messages: channel() });

    const failure = runRelayProgram(cleanupOwnMessages({ count: 5, pageSize: 50 }), relay.services);

    await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
    await expect(failure).rejects.toMatchObject({ key: "DISCORD_BOT_ID" });
    expect(relay.chat.queries).toEqual([]);
  });

  it("deletes a single message", async () => {
    const relay = createFakeRelay({ messages: channel() });

    await runRelayProgram(deleteMessage("2"), relay.services);

    expect(relay.chat.deleted).toEqual(["2"]);
  });

  it("surfaces a failed single delete", async () => {
    const relay = createFakeRelay({ messages: channel() });
    relay.chat.failDeleteIds.add("2");

    await expect(runRelayProgram(deleteMessage("2"), relay.services)).rejects.toThrow("cannot delete 2");
  });
});
