export const CONFIG_NAME = "discord-relay";
export const FLAG_FILE_NAME = "discord_new_message.flag";
export const ACTIVITY_LOG_FILE_NAME = "watchdog.log";
