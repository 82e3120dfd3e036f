/**
 * Campsite Watcher - Entry Point
 *
 * Architecture:
 * - Discord slash commands create and remove recurring check jobs
 * - The job scheduler re-triggers each job on a fixed interval
 * - The dispatcher fetches the arrival month, matches fully-free sites,
 *   posts an alert and deletes the job once the stay is bookable
 */
import { loadConfig } from "./config";
import { logger } from "./logger";
import { RecreationClient } from "./sdk";
import { createWebhookNotifier } from "./discord/notifications";
import { DiscordBot } from "./discord/bot";
import { CheckJobScheduler, RequestDispatcher, describeOutcome } from "./services";
import { describeError } from "./errors";

// Job status is logged once an hour
const JOB_LOG_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info("Starting campsite watcher...");

  const config = loadConfig();

  const client = new RecreationClient({
    baseUrl: config.RECREATION_API_BASE,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    proxyUrl: config.PROXY_URL,
    debug: config.DEBUG_SCHEMAS,
  });

  const webhooks = createWebhookNotifier(config.DISCORD_WEBHOOK_URLS);

  // The scheduler triggers the dispatcher, and the dispatcher deletes
  // jobs through the scheduler once a stay is found
  const scheduler: CheckJobScheduler = new CheckJobScheduler({
    intervalMs: config.CHECK_INTERVAL_MS,
    onTrigger: async (payload) => describeOutcome(await dispatcher.handleCheckRequest(payload)),
  });

  const dispatcher = new RequestDispatcher({
    source: client,
    notifier: webhooks.notifier,
    jobs: scheduler,
  });

  const discordBot = new DiscordBot({
    token: config.DISCORD_BOT_TOKEN,
    clientId: config.DISCORD_CLIENT_ID,
    context: { jobs: scheduler, checkIntervalMs: config.CHECK_INTERVAL_MS },
  });

  await discordBot.start();
  scheduler.logJobs();

  const jobLogTimer = setInterval(() => scheduler.logJobs(), JOB_LOG_INTERVAL_MS);

  logger.info(
    {
      checkIntervalMs: config.CHECK_INTERVAL_MS,
      webhookCount: config.DISCORD_WEBHOOK_URLS.length,
      proxy: Boolean(config.PROXY_URL),
    },
    "Campsite watcher started successfully"
  );

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    clearInterval(jobLogTimer);
    scheduler.logJobs();
    scheduler.stop();
    webhooks.destroy();
    await discordBot.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: describeError(error) }, "Error during shutdown");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, "Fatal error starting campsite watcher");
  process.exit(1);
});
