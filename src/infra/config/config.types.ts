import type { AllowlistEntry } from "../../core/domain/message.types";

export type RelayPaths = {
  configDir: string;
  stateDir: string;
  flagPath: string;
  activityLogPath: string;
  launchAgentDir: string;
};

export type RelayConfig = {
  discord: {
    token: string;
    channelId: string;
    botId?: string;
    requestTimeoutMs: number;
  };
  allowlist: AllowlistEntry[];
  rateLimitSeconds: number;
  paths: RelayPaths;
  poll: {
    pageSize: number;
    activityLogMaxLines: number;
    previewChars: number;
    source: string;
    notificationSound: string;
  };
  read: {
    pageSize: number;
    unreadPageSize: number;
    contextPageSize: number;
    contentChars: number;
  };
  desktop: {
    notify: boolean;
    inject: boolean;
    injectSessionMatch: string;
    injectCommand?: string;
    commandTimeoutMs: number;
  };
  hooks: {
    checkEvery: number;
    sessionStartSinceMinutes: number;
    postToolUseSinceMinutes: number;
  };
};

export type ReadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  loadEnvFiles?: boolean;
  /** When false, a missing token or channel id is left for the caller to report. */
  requireCredentials?: boolean;
};

export type LooseInput = Record<string, unknown>;

/** One configuration source. The allowlist travels apart from `values` so it is replaced, not concatenated, on merge. */
export type ConfigSource = {
  values: LooseInput;
  allowlist?: AllowlistEntry[];
};
