import { resolve } from "node:path";
import type { Logger } from "pino";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { ConfigurationError, errorMessage } from "./errors";
import { createLedgerStore } from "./ledger";
import { createArxivFetcher } from "./pipeline";
import { createDiscordSender, runDigest } from "./digest";
import { createDigestScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

function requireWebhookUrl(): string {
  const url = process.env["DISCORD_WEBHOOK_URL"];
  if (!url) {
    throw new ConfigurationError("environment variable DISCORD_WEBHOOK_URL is required");
  }
  return url;
}

function createRunner(config: AppConfig, webhookUrl: string, logger: Logger) {
  const store = createLedgerStore(
    { ...config.ledger, path: resolve(config.ledger.path) },
    logger,
  );
  const fetchItems = createArxivFetcher({
    endpoint: config.arxiv.endpoint,
    userAgent: config.arxiv.userAgent,
    timeoutMs: config.arxiv.requestTimeoutSeconds * 1000,
    maxResults: config.arxiv.maxResultsPerTopic,
  });
  const sendMessage = createDiscordSender(webhookUrl, {
    timeoutMs: config.discord.requestTimeoutSeconds * 1000,
    maxContentLength: config.discord.maxContentLength,
  });

  return {
    store,
    run: () => runDigest({ config, store, fetchItems, sendMessage, logger }),
  };
}

async function main(): Promise<void> {
  const logger = createLogger();
  const once = process.argv.includes("--once");

  logger.info({ configPath: CONFIG_PATH }, "arxiv-digest starting");

  let runner: ReturnType<typeof createRunner>;
  let cronExpression: string | undefined;
  try {
    const config = loadConfig(resolve(CONFIG_PATH));
    cronExpression = config.schedule.cron;
    runner = createRunner(config, requireWebhookUrl(), logger);
    logger.info(
      { topics: config.topics.length, ledger: runner.store.location },
      "config loaded",
    );
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "configuration error");
    process.exit(1);
  }

  if (once || cronExpression === undefined) {
    try {
      const summary = await runner.run();
      logger.info(
        { selected: summary.selectedCount, messages: summary.messageCount },
        "digest run complete",
      );
    } catch (err) {
      logger.fatal(
        { error: errorMessage(err), errorName: err instanceof Error ? err.name : undefined },
        "digest run failed",
      );
      process.exitCode = 1;
    } finally {
      runner.store.close();
    }
    return;
  }

  const scheduler = createDigestScheduler(cronExpression, runner.run, logger);
  logger.info({ schedule: cronExpression }, "digest scheduler started");

  registerShutdownHandlers({
    schedulers: [scheduler],
    store: runner.store,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
