import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_LOG_FILE_NAME, DEFAULT_LOG_LEVEL, TEST_LOG_LEVEL } from "./logger.consts";
import type { LoggerResolvedConfig } from "./logger.types";

export function defaultLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(env.HOME || homedir(), ".config", "discord-relay");
}

export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env, logDir: string = defaultLogDir(env)): LoggerResolvedConfig {
  const level = env.LOG_LEVEL?.trim() || (env.NODE_ENV === "test" ? TEST_LOG_LEVEL : DEFAULT_LOG_LEVEL);
  const usePretty = env.RELAY_PRETTY_LOGS !== "0";
  const fileLoggingEnabled = env.RELAY_LOG_TO_FILE !== "0";
  const defaultLogFilePath = resolve(logDir, DEFAULT_LOG_FILE_NAME);
  const logFilePath = env.RELAY_LOG_FILE?.trim() || defaultLogFilePath;

  const targets: LoggerResolvedConfig["targets"] = [];
  // silent: no transport workers
  if (level === TEST_LOG_LEVEL) {
    return { level, logFilePath, usePretty, fileLoggingEnabled, targets };
  }

  if (usePretty) {
    targets.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        // stdout carries command output
        destination: 2,
      },
    });
  }

  if (fileLoggingEnabled) {
    targets.push({
      target: "pino/file",
      options: {
        destination: logFilePath,
        mkdir: true,
      },
    });
  }

  return {
    level,
    logFilePath,
    usePretty,
    fileLoggingEnabled,
    targets,
  };
}
