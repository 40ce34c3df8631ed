import { describe, expect, it } from "vitest";
import { resolveLoggerConfig } from "./logger.utils";

describe("relay logger config", () => {
  it("uses test log level by default in test env and ships no targets", () => {
    const cfg = resolveLoggerConfig({ NODE_ENV: "test" }, "/tmp/relay");
    expect(cfg.level).toBe("silent");
    expect(cfg.targets).toHaveLength(0);
  });

  it("supports explicit level, no pretty, no file logging", () => {
    const cfg = resolveLoggerConfig(
      {
        LOG_LEVEL: "debug",
        RELAY_PRETTY_LOGS: "0",
        RELAY_LOG_TO_FILE: "0",
      },
      "/tmp/relay",
    );

    expect(cfg.level).toBe("debug");
    expect(cfg.usePretty).toBe(false);
    expect(cfg.fileLoggingEnabled).toBe(false);
    expect(cfg.targets).toHaveLength(0);
  });

  it("builds pretty and file targets with default path", () => {
    const cfg = resolveLoggerConfig({}, "/tmp/relay");

    expect(cfg.level).toBe("info");
    expect(cfg.logFilePath).toBe("/tmp/relay/discord-relay.log");
    expect(cfg.targets.map((target) => target.target)).toEqual(["pino-pretty", "pino/file"]);
    expect(cfg.targets[0]?.options).toMatchObject({ destination: 2 });
  });

  it("honours an explicit log file", () => {
    const cfg = resolveLoggerConfig({ RELAY_LOG_FILE: "/var/tmp/relay.log", RELAY_PRETTY_LOGS: "0" }, "/tmp/relay");
    expect(cfg.targets).toEqual([{ target: "pino/file", options: { destination: "/var/tmp/relay.log", mkdir: true } }]);
  });
});
