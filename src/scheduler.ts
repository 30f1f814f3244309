import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import { errorMessage } from "./errors";

export type DigestScheduler = {
  readonly stop: () => void;
  /** Resolves once no digest run is in flight. */
  readonly whenIdle: () => Promise<void>;
};

/**
 * Runs `runOnce` on the given cron expression.
 *
 * A tick that fires while the previous run is still in flight is skipped.
 * Failures are logged; the next tick retries with the same ledger state.
 */
export function createDigestScheduler(
  cronExpression: string,
  runOnce: () => Promise<unknown>,
  logger: Logger,
): DigestScheduler {
  let inFlight: Promise<void> | null = null;

  async function tick(): Promise<void> {
    logger.info("digest run starting");
    try {
      await runOnce();
      logger.info("digest run complete");
    } catch (err) {
      logger.error(
        { error: errorMessage(err), errorName: err instanceof Error ? err.name : undefined },
        "digest run failed",
      );
    }
  }

  const task: ScheduledTask = cron.schedule(cronExpression, async () => {
    if (inFlight) {
      logger.warn("previous digest run still in progress, skipping tick");
      return;
    }
    inFlight = tick();
    await inFlight;
    inFlight = null;
  });

  return {
    stop: () => {
      task.stop();
    },
    whenIdle: () => inFlight ?? Promise.resolve(),
  };
}
