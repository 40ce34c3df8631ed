import { homedir, tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ACTIVITY_LOG_FILE_NAME, CONFIG_NAME, FLAG_FILE_NAME } from "./config.consts";

export function homeDir(env: NodeJS.ProcessEnv): string {
  return env.HOME?.trim() || homedir();
}

export function configDir(env: NodeJS.ProcessEnv): string {
  return resolve(homeDir(env), ".config", CONFIG_NAME);
}

export function defaultStateDir(env: NodeJS.ProcessEnv): string {
  return resolve(configDir(env), "state");
}

export function defaultFlagPath(): string {
  return join(tmpdir(), FLAG_FILE_NAME);
}

export function defaultActivityLogPath(stateDir: string): string {
  return resolve(stateDir, ACTIVITY_LOG_FILE_NAME);
}

export function defaultLaunchAgentDir(env: NodeJS.ProcessEnv): string {
  return resolve(homeDir(env), "Library", "LaunchAgents");
}

/** Root of the installed package, the directory holding package.json and tsconfig.json. */
export function packageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
}
