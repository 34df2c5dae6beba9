import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { errorMessage } from "./errors.js";
import type { Logger } from "./types.js";

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

/**
 * Runs `run` now and then on every tick of `cronExpression`. A tick that
 * arrives while the previous run is still going is skipped.
 */
export function startScheduler(
  run: () => Promise<void>,
  cronExpression: string,
  logger: Logger = console,
): ScheduledTask {
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn(`[${timestamp()}] Previous check still running, skipping this tick.`);
      return;
    }
    running = true;
    try {
      await run();
    } catch (err) {
      logger.error(`[${timestamp()}] Check failed: ${errorMessage(err)}`);
    } finally {
      running = false;
    }
  };

  // Run immediately on start
  void tick();

  const task = cron.schedule(cronExpression, () => {
    void tick();
  });

  logger.log(`Scheduler running (${cronExpression}).\n`);
  return task;
}
