import { setTimeout as sleepFor } from "node:timers/promises";
import { logger } from "../../../infra/logger";
import { errorMessage } from "../../errors";

export type WatchLoopOptions = {
  intervalMs: number;
  signal: AbortSignal;
  tick: () => Promise<void>;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/**
 * Runs `tick` until the signal aborts. A failing tick is logged and the loop carries on,
 * the next tick being the retry.
 */
export async function runWatchLoop(options: WatchLoopOptions): Promise<number> {
  const sleep = options.sleep ?? defaultSleep;
  let ticks = 0;

  while (!options.signal.aborted) {
    ticks += 1;
    try {
      await options.tick();
    } catch (error) {
      logger.error({ tick: ticks, error: errorMessage(error) }, "[relay] Watch tick failed.");
    }
    if (options.signal.aborted) {
      break;
    }
    await sleep(options.intervalMs, options.signal);
  }

  logger.info({ ticks }, "[relay] Watch loop stopped.");
  return ticks;
}
