/**
 * Composition root: turns a resolved config into the port implementations the workflows run against.
 */
import type { RelayServiceImpls } from "./core/application/services.types";
import type { TerminalInjectors } from "./core/ports/desktop.types";
import type { RelayConfig } from "./infra/config";
import { createDiscordChatClient, createDiscordRest } from "./infra/discord/discord-client/discord-client";
import {
  createCommandInjector,
  createCurrentSessionInjector,
  createNamedSessionInjector,
} from "./infra/desktop/iterm-injector/iterm-injector";
import { createMacosNotifier } from "./infra/desktop/macos-notifier/macos-notifier";
import type { ProcessRunner } from "./infra/runtime/runtime-process/runtime-process.types";
import { createFileActivityLog, createFileMessageFlag } from "./infra/state/file-activity-log/file-activity-log";
import { createFileStateStore } from "./infra/state/file-state-store/file-state-store";
import { createSystemClock } from "./infra/time/system-clock/system-clock";

export function createTerminalInjectors(config: RelayConfig, run?: ProcessRunner): TerminalInjectors {
  const options = { timeoutMs: config.desktop.commandTimeoutMs, ...(run ? { run } : {}) };
  return {
    primary: config.desktop.injectCommand
      ? createCommandInjector(config.desktop.injectCommand, options)
      : createNamedSessionInjector(config.desktop.injectSessionMatch, options),
    fallback: createCurrentSessionInjector(options),
  };
}

export function createRelayServices(config: RelayConfig, overrides?: Partial<RelayServiceImpls>): RelayServiceImpls {
  return {
    chatClient:
      overrides?.chatClient ??
      createDiscordChatClient({
        channelId: config.discord.channelId,
        rest: createDiscordRest(config.discord.token, config.discord.requestTimeoutMs),
      }),
    stateStore: overrides?.stateStore ?? createFileStateStore(config.paths.stateDir),
    clock: overrides?.clock ?? createSystemClock(),
    notifier: overrides?.notifier ?? createMacosNotifier({ timeoutMs: config.desktop.commandTimeoutMs }),
    injectors: overrides?.injectors ?? createTerminalInjectors(config),
    activityLog: overrides?.activityLog ?? createFileActivityLog(config.paths.activityLogPath, config.poll.activityLogMaxLines),
    messageFlag: overrides?.messageFlag ?? createFileMessageFlag(config.paths.flagPath),
  };
}
