import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { parseAllowlist } from "../../core/domain/allowlist.utils";
import { configDir } from "./paths";
import type { ConfigSource } from "./config.types";
import { parseFlag, parseNumber, trimmed } from "./validation";

/** Variables already present in the environment win over every file. */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const candidates = [
    trimmed(process.env.RELAY_ENV_PATH),
    resolve(configDir(process.env), ".env"),
    resolve(cwd, ".env"),
  ].filter((value): value is string => Boolean(value));

  for (const path of candidates) {
    loadDotenv({ path, override: false });
  }
}

export function fromEnv(env: NodeJS.ProcessEnv): ConfigSource {
  const values = {
    discord: {
      token: trimmed(env.DISCORD_BOT_TOKEN),
      channelId: trimmed(env.DISCORD_CHANNEL_ID),
      botId: trimmed(env.DISCORD_BOT_ID),
      requestTimeoutMs: parseNumber(env.RELAY_REQUEST_TIMEOUT_MS),
    },
    rateLimitSeconds: parseNumber(env.DISCORD_RATE_LIMIT),
    paths: {
      stateDir: trimmed(env.RELAY_STATE_DIR),
      flagPath: trimmed(env.RELAY_FLAG_FILE),
      activityLogPath: trimmed(env.RELAY_ACTIVITY_LOG),
    },
    desktop: {
      notify: parseFlag(env.RELAY_NOTIFY),
      inject: parseFlag(env.RELAY_INJECT),
      injectSessionMatch: trimmed(env.RELAY_INJECT_SESSION),
      injectCommand: trimmed(env.RELAY_INJECT_COMMAND),
    },
  };
  return env.DISCORD_ALLOWED_USERS !== undefined ? { values, allowlist: parseAllowlist(env.DISCORD_ALLOWED_USERS) } : { values };
}
