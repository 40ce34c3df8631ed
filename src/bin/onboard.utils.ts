import { confirm, isCancel, text } from "@clack/prompts";
import { resolve } from "node:path";
import { fileExists, writeTextFile } from "../infra/runtime/runtime-fs/runtime-fs";
import type { OnboardResult, OnboardValues } from "./onboard/onboard.types";

function assertNotCancelled<T>(value: T | symbol, message: string): T {
  if (isCancel(value)) {
    throw new Error(message);
  }
  return value;
}

function required(label: string) {
  return (value: string | undefined): string | undefined => (value?.trim() ? undefined : `${label} is required`);
}

export function renderEnvTemplate(values: OnboardValues): string {
  return [
    `DISCORD_BOT_TOKEN=${values.token}`,
    `DISCORD_CHANNEL_ID=${values.channelId}`,
    `DISCORD_BOT_ID=${values.botId ?? ""}`,
    "# id:Name pairs, comma separated; empty allows everyone",
    `DISCORD_ALLOWED_USERS=${values.allowedUsers ?? ""}`,
    "DISCORD_RATE_LIMIT=300",
    "",
    "# Desktop delivery",
    "RELAY_NOTIFY=1",
    "RELAY_INJECT=1",
    "RELAY_INJECT_SESSION=claude",
    "RELAY_INJECT_COMMAND=",
    "",
    "# Logging",
    "LOG_LEVEL=info",
    "RELAY_PRETTY_LOGS=1",
    "RELAY_LOG_TO_FILE=1",
    "RELAY_LOG_FILE=",
    "",
  ].join("\n");
}

export async function runOnboarding(configDir: string): Promise<OnboardResult> {
  const envPath = resolve(configDir, ".env");

  if (await fileExists(envPath)) {
    const overwrite = assertNotCancelled(
      await confirm({ message: `${envPath} already exists. Overwrite it?`, initialValue: false }),
      "Onboarding cancelled",
    );
    if (!overwrite) {
      return { configDir, envPath, written: false };
    }
  }

  const token = assertNotCancelled(
    await text({ message: "Discord bot token", validate: required("Bot token") }),
    "Onboarding cancelled",
  );
  const channelId = assertNotCancelled(
    await text({ message: "Channel id to relay", placeholder: "123456789012345678", validate: required("Channel id") }),
    "Onboarding cancelled",
  );
  const botId = assertNotCancelled(
    await text({ message: "The bot's own user id (optional, used to skip its own messages)" }),
    "Onboarding cancelled",
  );
  const allowedUsers = assertNotCancelled(
    await text({ message: "Allowed users as id:Name pairs (optional)", placeholder: "111:Alice,222:Bob" }),
    "Onboarding cancelled",
  );

  await writeTextFile(
    envPath,
    renderEnvTemplate({
      token: token.trim(),
      channelId: channelId.trim(),
      ...(botId?.trim() ? { botId: botId.trim() } : {}),
      ...(allowedUsers?.trim() ? { allowedUsers: allowedUsers.trim() } : {}),
    }),
  );
  return { configDir, envPath, written: true };
}
