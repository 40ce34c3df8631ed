import { describe, expect, it } from "vitest";
import { chatMessage, createFakeRelay } from "../../../../test/support/relay-fakes";
import { formatActivityLine } from "../activity/activity";
import { runRelayProgram } from "../effect.utils";
import { dispatchHumanMessages } from "./dispatch";
import type { DispatchOptions } from "./dispatch.types";

const options: DispatchOptions = {
  source: "Discord",
  previewChars: 80,
  notify: true,
  inject: true,
  notificationSound: "Ping",
};

const batch = [chatMessage("3", { content: "yo" }), chatMessage("4", { displayName: "Alice", content: "hi\n  there" })];

describe("dispatch", () => {
  it("flags the batch, announces and injects the latest message", async () => {
    const relay = createFakeRelay();

    const report = await runRelayProgram(dispatchHumanMessages(batch, options), relay.services);

    expect(report).toEqual({
      flagged: true,
      notified: true,
      injection: { status: "injected", via: "primary", detail: "typed into primary" },
    });
    expect(relay.flag.text).toBe("[2026-05-06 07:08:09] alice: yo\n[2026-05-06 07:08:09] Alice: hi\n  there");
    expect(relay.notifier.sent).toEqual([{ title: "Discord: Alice", message: "hi there", sound: "Ping" }]);
    expect(relay.primary.texts).toEqual(["[Discord from Alice]: hi\n  there"]);
    expect(relay.fallback.texts).toEqual([]);

    const now = relay.clock.now();
    expect(relay.activityLog.lines).toEqual([
      formatActivityLine(now, "INJECTED via primary: typed into primary"),
      formatActivityLine(now, "NEW: [2026-05-06 07:08:09] alice: yo"),
      formatActivityLine(now, "NEW: [2026-05-06 07:08:09] Alice: hi\n  there"),
    ]);
  });

  it("falls back when the primary injector fails", async () => {
    const relay = createFakeRelay();
    relay.primary.failWith = new Error("no session named claude");

    const report = await runRelayProgram(dispatchHumanMessages(batch, options), relay.services);

    expect(report.injection).toEqual({ status: "injected", via: "fallback", detail: "typed into fallback" });
    expect(relay.fallback.texts).toEqual(["[Discord from Alice]: hi\n  there"]);
  });

  it("logs both failures without failing the batch", async () => {
    const relay = createFakeRelay();
    relay.primary.failWith = new Error("no session named claude");
    relay.fallback.failWith = new Error("iTerm2 not running");

    const report = await runRelayProgram(dispatchHumanMessages(batch, options), relay.services);

    expect(report.injection).toEqual({ status: "failed", errors: ["no session named claude", "iTerm2 not running"] });
    expect(relay.activityLog.lines[0]).toBe(
      formatActivityLine(relay.clock.now(), "INJECT FAIL (both): no session named claude / iTerm2 not running"),
    );
  });

  it("swallows notification and activity log failures", async () => {
    const relay = createFakeRelay();
    relay.notifier.failWith = new Error("osascript missing");
    relay.activityLog.failWith = new Error("disk full");

    const report = await runRelayProgram(dispatchHumanMessages(batch, options), relay.services);

    expect(report.notified).toBe(false);
    expect(report.injection.status).toBe("injected");
  });

  it("skips disabled side effects", async () => {
    const relay = createFakeRelay();

    const report = await runRelayProgram(
      dispatchHumanMessages(batch, { ...options, notify: false, inject: false }),
      relay.services,
    );

    expect(report).toEqual({ flagged: true, notified: false, injection: { status: "skipped" } });
    expect(relay.notifier.sent).toEqual([]);
    expect(relay.primary.texts).toEqual([]);
    expect(relay.activityLog.lines[0]).toBe(formatActivityLine(relay.clock.now(), "injection disabled, skipping"));
  });

  it("does nothing for an empty batch", async () => {
    const relay = createFakeRelay();

    const report = await runRelayProgram(dispatchHumanMessages([], options), relay.services);

    expect(report).toEqual({ flagged: false, notified: false, injection: { status: "skipped" } });
    expect(relay.flag.text).toBeUndefined();
    expect(relay.activityLog.lines).toEqual([]);
  });
});
