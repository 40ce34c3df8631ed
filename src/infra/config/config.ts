import { resolve } from "node:path";
import { z } from "zod";
import { defu } from "defu";
import { loadConfig } from "c12";
import { parseAllowlist } from "../../core/domain/allowlist.utils";
import { ConfigurationError, errorMessage } from "../../core/errors";
import { CONFIG_NAME } from "./config.consts";
import { mergedConfigSchema, type MergedConfigInput, userConfigSchema } from "./config.schema";
import type { ConfigSource, ReadConfigOptions, RelayConfig } from "./config.types";
import { fromEnv, loadEnvFiles } from "./env";
import { configDir, defaultActivityLogPath, defaultFlagPath, defaultLaunchAgentDir, defaultStateDir } from "./paths";
import { toFriendlyZodError, trimmed } from "./validation";

function defaultsInput(env: NodeJS.ProcessEnv): MergedConfigInput {
  return {
    discord: {
      token: "",
      channelId: "",
      requestTimeoutMs: 10_000,
    },
    rateLimitSeconds: 300,
    paths: {
      stateDir: defaultStateDir(env),
      flagPath: defaultFlagPath(),
      launchAgentDir: defaultLaunchAgentDir(env),
    },
    poll: {
      pageSize: 10,
      activityLogMaxLines: 100,
      previewChars: 80,
      source: "Discord",
      notificationSound: "Ping",
    },
    read: {
      pageSize: 50,
      unreadPageSize: 10,
      contextPageSize: 20,
      contentChars: 500,
    },
    desktop: {
      notify: true,
      inject: true,
      injectSessionMatch: "claude",
      commandTimeoutMs: 15_000,
    },
    hooks: {
      checkEvery: 15,
      sessionStartSinceMinutes: 60,
      postToolUseSinceMinutes: 30,
    },
  };
}

function fromUserConfig(raw: unknown): ConfigSource {
  const parsed = userConfigSchema.parse(raw ?? {});
  const allowlist = typeof parsed.allowlist === "string" ? parseAllowlist(parsed.allowlist) : parsed.allowlist;
  return {
    values: {
      discord: {
        token: trimmed(parsed.discord?.token),
        channelId: trimmed(parsed.discord?.channelId),
        botId: trimmed(parsed.discord?.botId),
        requestTimeoutMs: parsed.discord?.requestTimeoutMs,
      },
      rateLimitSeconds: parsed.rateLimitSeconds,
      paths: parsed.paths,
      poll: parsed.poll,
      read: parsed.read,
      desktop: parsed.desktop,
      hooks: parsed.hooks,
    },
    ...(allowlist ? { allowlist } : {}),
  };
}

/**
 * Merges sources (first wins) over the defaults. The allowlist is taken whole from the first
 * source that sets it, since defu would concatenate arrays.
 */
export function buildRelayConfig(
  sources: ConfigSource[],
  env: NodeJS.ProcessEnv,
  options?: { requireCredentials?: boolean },
): RelayConfig {
  const merged = mergedConfigSchema.parse(defu({}, ...sources.map((source) => source.values), defaultsInput(env)));
  const allowlist = sources.find((source) => source.allowlist !== undefined)?.allowlist ?? [];

  if (options?.requireCredentials !== false) {
    if (!merged.discord.token) {
      throw new ConfigurationError("Bot token is missing. Set DISCORD_BOT_TOKEN or discord.token.", "DISCORD_BOT_TOKEN");
    }
    if (!merged.discord.channelId) {
      throw new ConfigurationError("Channel id is missing. Set DISCORD_CHANNEL_ID or discord.channelId.", "DISCORD_CHANNEL_ID");
    }
  }

  return {
    discord: {
      token: merged.discord.token,
      channelId: merged.discord.channelId,
      ...(merged.discord.botId ? { botId: merged.discord.botId } : {}),
      requestTimeoutMs: merged.discord.requestTimeoutMs,
    },
    allowlist,
    rateLimitSeconds: merged.rateLimitSeconds,
    paths: {
      configDir: configDir(env),
      stateDir: merged.paths.stateDir,
      flagPath: merged.paths.flagPath,
      activityLogPath: merged.paths.activityLogPath ?? defaultActivityLogPath(merged.paths.stateDir),
      launchAgentDir: merged.paths.launchAgentDir,
    },
    poll: merged.poll,
    read: merged.read,
    desktop: {
      notify: merged.desktop.notify,
      inject: merged.desktop.inject,
      injectSessionMatch: merged.desktop.injectSessionMatch,
      ...(merged.desktop.injectCommand ? { injectCommand: merged.desktop.injectCommand } : {}),
      commandTimeoutMs: merged.desktop.commandTimeoutMs,
    },
    hooks: merged.hooks,
  };
}

/** Precedence: environment, then `discord-relay.config.*` in `cwd`, then the one in the global config dir, then defaults. */
export async function readRelayConfig(options?: ReadConfigOptions): Promise<RelayConfig> {
  const cwd = options?.cwd ?? process.cwd();
  const env = options?.env ?? process.env;
  if (options?.loadEnvFiles !== false) {
    loadEnvFiles(cwd);
  }

  try {
    const loadLocal = await loadConfig({ name: CONFIG_NAME, dotenv: false, defaults: {}, cwd });
    const globalDir = configDir(env);
    const loadGlobal =
      resolve(globalDir) === resolve(cwd)
        ? { config: {} }
        : await loadConfig({ name: CONFIG_NAME, dotenv: false, defaults: {}, cwd: globalDir });

    return buildRelayConfig(
      [fromEnv(env), fromUserConfig(loadLocal.config), fromUserConfig(loadGlobal.config)],
      env,
      { requireCredentials: options?.requireCredentials ?? true },
    );
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigurationError(toFriendlyZodError(error));
    }
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load discord-relay config: ${errorMessage(error)}`);
  }
}
