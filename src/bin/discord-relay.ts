#!/usr/bin/env tsx

import { resolve } from "node:path";
import { cac } from "cac";
import { z } from "zod";
import { errorMessage } from "../core/errors";
import { packageRoot, readRelayConfig, type RelayConfig } from "../infra/config";
import { LAUNCH_AGENT_LABEL, installLaunchAgent } from "../infra/launchd/launch-agent";
import { logger } from "../infra/logger";
import { fileExists } from "../infra/runtime/runtime-fs/runtime-fs";
import { createRelayServices } from "../main";
import {
  CLI_NAME,
  cleanupCommand,
  contextCommand,
  deleteCommand,
  describeFailure,
  doctorReport,
  hookCommand,
  interactionsCommand,
  parseHookEvent,
  parsePositiveInt,
  pollCommand,
  readCommand,
  sendCommand,
  unreadCommand,
  usersCommand,
  watchCommand,
  type CommandContext,
} from "./commands.utils";
import { runOnboarding } from "./onboard.utils";
import { writeOutput } from "./output.utils";

const cli = cac(CLI_NAME);

const textArgsSchema = z.array(z.union([z.string(), z.number()])).transform((parts) => parts.map(String).join(" "));
const forceOptionsSchema = z.object({ force: z.boolean().optional() });

async function withCliErrors(task: () => Promise<void>, options?: { quiet?: boolean }): Promise<void> {
  try {
    await task();
  } catch (error) {
    const failure = describeFailure(error);
    if (options?.quiet) {
      logger.warn({ error: errorMessage(error) }, "[relay] Hook failed.");
      return;
    }
    if (failure.exitCode === 0) {
      writeOutput(failure.output);
      return;
    }
    logger.error({ error: errorMessage(error) }, "[relay] Command failed.");
    process.stderr.write(`${failure.output}\n`);
    process.exitCode = failure.exitCode;
  }
}

async function loadContext(): Promise<CommandContext> {
  const config = await readRelayConfig();
  return { config, services: createRelayServices(config) };
}

async function loadConfigOnly(): Promise<RelayConfig> {
  return await readRelayConfig({ requireCredentials: false });
}

cli
  .command("read", "Show recent messages, humans only unless --all")
  .option("--since <minutes>", "Only messages from the last N minutes")
  .option("--all", "Include automated authors")
  .action(async (options: unknown) => {
    await withCliErrors(async () => {
      const parsed = z.object({ since: z.unknown().optional(), all: z.boolean().optional() }).parse(options);
      const sinceMinutes = parsePositiveInt(parsed.since, "--since");
      const ctx = await loadContext();
      writeOutput(await readCommand(ctx, { all: parsed.all ?? false, ...(sinceMinutes ? { sinceMinutes } : {}) }));
    });
  });

cli.command("unread", "Show human messages after the read cursor").action(async () => {
  await withCliErrors(async () => {
    writeOutput(await unreadCommand(await loadContext()));
  });
});

cli
  .command("send <...text>", "Post a message through the rate gate")
  .option("--force", "Bypass the rate gate")
  .action(async (text: unknown, options: unknown) => {
    await withCliErrors(async () => {
      const content = textArgsSchema.parse(text);
      const parsed = forceOptionsSchema.parse(options);
      writeOutput(await sendCommand(await loadContext(), { content, force: parsed.force ?? false }));
    });
  });

cli
  .command("reply <messageId> <...text>", "Reply to a message through the rate gate")
  .option("--force", "Bypass the rate gate")
  .action(async (messageId: unknown, text: unknown, options: unknown) => {
    await withCliErrors(async () => {
      const replyToId = z.union([z.string(), z.number()]).transform(String).parse(messageId);
      const content = textArgsSchema.parse(text);
      const parsed = forceOptionsSchema.parse(options);
      writeOutput(await sendCommand(await loadContext(), { content, force: parsed.force ?? false, replyToId }));
    });
  });

cli
  .command("interactions", "Pending messages from allowlisted users")
  .option("--since <minutes>", "Window when no interaction cursor exists")
  .option("--json", "Print the result as JSON")
  .option("--no-mark", "Leave the interaction cursor where it is")
  .action(async (options: unknown) => {
    await withCliErrors(async () => {
      const parsed = z
        .object({ since: z.unknown().optional(), json: z.boolean().optional(), mark: z.boolean().optional() })
        .parse(options);
      const sinceMinutes = parsePositiveInt(parsed.since, "--since");
      writeOutput(
        await interactionsCommand(await loadContext(), {
          json: parsed.json ?? false,
          mark: parsed.mark ?? true,
          ...(sinceMinutes ? { sinceMinutes } : {}),
        }),
      );
    });
  });

cli.command("cleanup [count]", "Delete the bot's own most recent messages").action(async (count: unknown) => {
  await withCliErrors(async () => {
    writeOutput(await cleanupCommand(await loadContext(), parsePositiveInt(count, "count") ?? 5));
  });
});

cli.command("delete <messageId>", "Delete one message").action(async (messageId: unknown) => {
  await withCliErrors(async () => {
    const id = z.union([z.string(), z.number()]).transform(String).parse(messageId);
    writeOutput(await deleteCommand(await loadContext(), id));
  });
});

cli.command("watch [interval]", "Print unread messages every N seconds").action(async (interval: unknown) => {
  await withCliErrors(async () => {
    const intervalSeconds = parsePositiveInt(interval, "interval") ?? 30;
    const ctx = await loadContext();
    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
    try {
      await watchCommand(ctx, { intervalSeconds, signal: controller.signal, write: writeOutput });
    } finally {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
  });
});

cli.command("users", "List the allowlist").action(async () => {
  await withCliErrors(async () => {
    writeOutput(usersCommand(await loadConfigOnly()));
  });
});

cli.command("context", "Recent human messages formatted for the assistant").action(async () => {
  await withCliErrors(async () => {
    writeOutput(await contextCommand(await loadContext()));
  });
});

cli.command("poll", "One fetch and delivery pass (run by the scheduler)").action(async () => {
  await withCliErrors(async () => {
    writeOutput(await pollCommand(await loadContext()));
  });
});

cli.command("hook <event>", "Assistant hook: session-start | post-tool-use").action(async (event: unknown) => {
  // hook errors are logged, never fatal
  await withCliErrors(
    async () => {
      const parsedEvent = parseHookEvent(z.string().parse(event));
      const output = await hookCommand(await loadContext(), parsedEvent);
      if (output) {
        writeOutput(output);
      }
    },
    { quiet: true },
  );
});

cli
  .command("install-agent", "Write a launchd agent that runs poll on a schedule")
  .option("--interval <seconds>", "Seconds between runs", { default: 60 })
  .option("--load", "Load the agent with launchctl")
  .action(async (options: unknown) => {
    await withCliErrors(async () => {
      const parsed = z.object({ interval: z.unknown().optional(), load: z.boolean().optional() }).parse(options);
      const intervalSeconds = parsePositiveInt(parsed.interval, "--interval") ?? 60;
      const config = await loadConfigOnly();
      const envFile = resolve(process.cwd(), ".env");

      const result = await installLaunchAgent({
        launchAgentDir: config.paths.launchAgentDir,
        load: parsed.load ?? false,
        definition: {
          label: LAUNCH_AGENT_LABEL,
          programArguments: [resolve(process.argv[1] ?? CLI_NAME), "poll"],
          workingDirectory: packageRoot(),
          intervalSeconds,
          logPath: resolve(config.paths.stateDir, "launchd.log"),
          environment: {
            PATH: process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin",
            ...((await fileExists(envFile)) ? { RELAY_ENV_PATH: envFile } : {}),
          },
        },
      });

      writeOutput(
        [
          `Installed launch agent: ${result.path} (every ${intervalSeconds}s)`,
          result.loaded ? "Loaded with launchctl." : `Load it with: launchctl load ${result.path}`,
          `Uninstall: launchctl unload ${result.path}`,
        ].join("\n"),
      );
    });
  });

cli.command("doctor", "Show configuration diagnostics").action(async () => {
  await withCliErrors(async () => {
    writeOutput(doctorReport(await loadConfigOnly(), process.env));
  });
});

cli.command("onboard", "Create a starter env file with credentials").action(async () => {
  await withCliErrors(async () => {
    const config = await loadConfigOnly();
    const result = await runOnboarding(config.paths.configDir);
    writeOutput(result.written ? `Wrote ${result.envPath}` : `Kept existing ${result.envPath}`);
  });
});

cli.help();
cli.parse(process.argv, { run: false });
await cli.runMatchedCommand();
