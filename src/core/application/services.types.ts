import { Context } from "effect";
import type { ActivityLog, MessageFlag } from "../ports/activity-log.types";
import type { ChatClient } from "../ports/chat-client.types";
import type { Clock } from "../ports/clock.types";
import type { DesktopNotifier, TerminalInjectors } from "../ports/desktop.types";
import type { StateStore } from "../ports/state-store.types";

export class ChatClientService extends Context.Tag("ChatClientService")<ChatClientService, ChatClient>() {}

export class StateStoreService extends Context.Tag("StateStoreService")<StateStoreService, StateStore>() {}

export class ClockService extends Context.Tag("ClockService")<ClockService, Clock>() {}

export class NotifierService extends Context.Tag("NotifierService")<NotifierService, DesktopNotifier>() {}

export class InjectorsService extends Context.Tag("InjectorsService")<InjectorsService, TerminalInjectors>() {}

export class ActivityLogService extends Context.Tag("ActivityLogService")<ActivityLogService, ActivityLog>() {}

export class MessageFlagService extends Context.Tag("MessageFlagService")<MessageFlagService, MessageFlag>() {}

export type RelayServices =
  | ChatClientService
  | StateStoreService
  | ClockService
  | NotifierService
  | InjectorsService
  | ActivityLogService
  | MessageFlagService;

export type RelayServiceImpls = {
  chatClient: ChatClient;
  stateStore: StateStore;
  clock: Clock;
  notifier: DesktopNotifier;
  injectors: TerminalInjectors;
  activityLog: ActivityLog;
  messageFlag: MessageFlag;
};
