export type DesktopNotification = {
  title: string;
  message: string;
  sound?: string;
};

export interface DesktopNotifier {
  notify(notification: DesktopNotification): Promise<void>;
}

/** Types text into a terminal session. Rejects with `InjectionError` when the session cannot be reached. */
export interface TerminalInjector {
  readonly name: string;
  inject(text: string): Promise<string>;
}

export type TerminalInjectors = {
  primary: TerminalInjector;
  fallback: TerminalInjector;
};
