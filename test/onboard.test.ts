import { describe, expect, it } from "vitest";
import { renderEnvTemplate } from "@bin/onboard.utils";

describe("onboarding", () => {
  it("renders credentials into the env template", () => {
    const lines = renderEnvTemplate({ token: "test-token", channelId: "555", allowedUsers: "111:Alice" }).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "DISCORD_BOT_TOKEN=test-token",
      "DISCORD_CHANNEL_ID=555",
      "DISCORD_BOT_ID=",
      "# id:Name pairs, comma separated; empty allows everyone",
      "DISCORD_ALLOWED_USERS=111:Alice",
    ]);
    expect(lines).toContain("RELAY_INJECT_SESSION=claude");
  });
});
