export type DispatchOptions = {
  source: string;
  previewChars: number;
  notify: boolean;
  inject: boolean;
  notificationSound?: string;
};

export type InjectionOutcome =
  | { status: "injected"; via: string; detail: string }
  | { status: "failed"; errors: string[] }
  | { status: "skipped" };

export type DispatchReport = {
  flagged: boolean;
  notified: boolean;
  injection: InjectionOutcome;
};
