export type OnboardValues = {
  token: string;
  channelId: string;
  botId?: string;
  allowedUsers?: string;
};

export type OnboardResult = {
  configDir: string;
  envPath: string;
  written: boolean;
};
