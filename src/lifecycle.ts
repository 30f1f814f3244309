// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";
import type { LedgerStore } from "./ledger";
import type { DigestScheduler } from "./scheduler";

const DEFAULT_DRAIN_TIMEOUT_MS = 60_000;

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<DigestScheduler>;
  readonly store: Pick<LedgerStore, "location" | "close">;
  readonly logger: Logger;
  /** How long to wait for an in-flight run before closing the store anyway. */
  readonly drainTimeoutMs?: number;
  readonly exit?: (code: number) => void;
};

/**
 * Registers SIGTERM and SIGINT handlers and returns the shutdown routine
 * they call.
 *
 * Schedulers stop first so no new run starts. A run already in flight gets
 * up to `drainTimeoutMs` to commit its ledger before the store is closed.
 * Later signals are ignored once shutdown has begun.
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  const { logger, store } = deps;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const drainTimeoutMs = deps.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  let shuttingDown = false;

  async function drain(): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), drainTimeoutMs);
    });
    const idle = Promise.all(deps.schedulers.map((s) => s.whenIdle())).then(() => true);
    try {
      return await Promise.race([idle, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        logger.error({ error: errorMessage(err) }, "error stopping scheduler");
      }
    }

    if (!(await drain())) {
      logger.warn(
        { drainTimeoutMs },
        "digest run still in flight, closing ledger store without its commit",
      );
    }

    try {
      store.close();
      logger.info({ location: store.location }, "ledger store closed");
    } catch (err) {
      logger.error(
        { location: store.location, error: errorMessage(err) },
        "error closing ledger store",
      );
    }

    logger.info("shutdown complete");
    exit(0);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: errorMessage(err) }, "shutdown failed");
      exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  return shutdown;
}
