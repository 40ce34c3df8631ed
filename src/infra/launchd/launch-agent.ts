import { join } from "node:path";
import { RelayError } from "../../core/errors";
import { logger } from "../logger";
import { writeTextFileAtomic } from "../runtime/runtime-fs/runtime-fs";
import { runProcess } from "../runtime/runtime-process/runtime-process";
import type { ProcessRunner } from "../runtime/runtime-process/runtime-process.types";

export const LAUNCH_AGENT_LABEL = "com.discord-relay.poll";

export type LaunchAgentDefinition = {
  label: string;
  programArguments: string[];
  workingDirectory: string;
  intervalSeconds: number;
  logPath: string;
  environment: Record<string, string>;
};

export type InstallLaunchAgentOptions = {
  launchAgentDir: string;
  definition: LaunchAgentDefinition;
  load: boolean;
  run?: ProcessRunner;
};

export type InstallLaunchAgentResult = {
  path: string;
  loaded: boolean;
};

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function stringTag(value: string, indent: string): string {
  return `${indent}<string>${escapeXml(value)}</string>`;
}

export function renderLaunchAgentPlist(definition: LaunchAgentDefinition): string {
  const environment = Object.entries(definition.environment)
    .sort(([left], [right]) => left.localeCompare(right))
    .flatMap(([key, value]) => [`        <key>${escapeXml(key)}</key>`, stringTag(value, "        ")]);

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
    '<plist version="1.0">',
    "<dict>",
    "    <key>Label</key>",
    stringTag(definition.label, "    "),
    "    <key>ProgramArguments</key>",
    "    <array>",
    ...definition.programArguments.map((argument) => stringTag(argument, "        ")),
    "    </array>",
    "    <key>WorkingDirectory</key>",
    stringTag(definition.workingDirectory, "    "),
    ...(environment.length > 0 ? ["    <key>EnvironmentVariables</key>", "    <dict>", ...environment, "    </dict>"] : []),
    "    <key>StartInterval</key>",
    `    <integer>${Math.max(1, Math.floor(definition.intervalSeconds))}</integer>`,
    "    <key>RunAtLoad</key>",
    "    <true/>",
    "    <key>StandardOutPath</key>",
    stringTag(definition.logPath, "    "),
    "    <key>StandardErrorPath</key>",
    stringTag(definition.logPath, "    "),
    "</dict>",
    "</plist>",
    "",
  ].join("\n");
}

export function launchAgentPath(launchAgentDir: string, label: string): string {
  return join(launchAgentDir, `${label}.plist`);
}

export async function installLaunchAgent(options: InstallLaunchAgentOptions): Promise<InstallLaunchAgentResult> {
  const path = launchAgentPath(options.launchAgentDir, options.definition.label);
  await writeTextFileAtomic(path, renderLaunchAgentPlist(options.definition));
  logger.info({ path, intervalSeconds: options.definition.intervalSeconds }, "[relay] Launch agent written.");

  if (!options.load) {
    return { path, loaded: false };
  }

  const run = options.run ?? runProcess;
  // Unloading an agent that was never loaded fails; only the load result matters.
  const unloaded = await run(["launchctl", "unload", path], { timeoutMs: 10_000 });
  logger.debug({ path, code: unloaded.code }, "[relay] Previous launch agent unloaded.");

  const loaded = await run(["launchctl", "load", path], { timeoutMs: 10_000 });
  if (loaded.code !== 0) {
    throw new RelayError(`launchctl load failed (${loaded.code}): ${loaded.stderr.trim() || "no output"}`);
  }
  logger.info({ path }, "[relay] Launch agent loaded.");
  return { path, loaded: true };
}
