/**
 * HYPERLIQUID ACCOUNT MONITOR
 * ===========================
 * Main entry point
 *
 * Watches one Hyperliquid address and sends a Telegram message whenever
 * a position is opened, closed or resized, or a new trade is filled.
 *
 * Flow:
 * 1. Poll the address's positions and recent fills
 * 2. Diff against the previous poll
 * 3. Notify each change
 */

// Load environment variables before any module reads them
import "dotenv/config";
import { HyperliquidAPI } from "./api/hyperliquid-api";
import { TelegramNotifier } from "./alerts";
import { AccountPoller, ChangeDetector } from "./polling";
import { loadConfig, MonitorConfig } from "./config";
import { ConfigError, createLogger, errorMessage, logger as bootLogger } from "./utils";

async function main(): Promise<void> {
  let config: MonitorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      bootLogger.error(`Configuration error: ${error.message}`);
      bootLogger.info("Copy .env.example to .env and fill in HYPERLIQUID_ADDRESS, TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID");
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  logger.info(`Using ${config.isTestnet ? "TESTNET" : "MAINNET"} API (${config.apiUrl})`);

  const api = new HyperliquidAPI({
    baseUrl: config.apiUrl,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    logger,
  });

  const notifier = new TelegramNotifier({
    botToken: config.telegram.botToken,
    chatId: config.telegram.chatId,
    address: config.address,
    logger,
  });

  const poller = new AccountPoller(
    {
      address: config.address,
      intervalMs: config.intervalMs,
      fillsLimit: config.fillsLimit,
      maxConsecutiveErrors: config.maxConsecutiveErrors,
      shutdownGraceMs: config.shutdownGraceMs,
    },
    {
      fetcher: api,
      notifier,
      detector: new ChangeDetector(config.sizeEpsilon),
      logger,
    }
  );

  // Graceful shutdown handler: first signal stops the loop, second one forces exit
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`${signal} received again, exiting now`);
      process.exit(1);
    }
    logger.info(`${signal} received, shutting down...`);
    controller.abort(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await poller.run(controller.signal);

  const stats = poller.getStats();
  logger.info("╔═══════════════════════════════════════════════════════════╗");
  logger.info("║                   SESSION SUMMARY                         ║");
  logger.info("╠═══════════════════════════════════════════════════════════╣");
  logger.info(`║  Polls completed:   ${String(stats.pollCount).padEnd(38)}║`);
  logger.info(`║  Changes detected:  ${String(stats.changesDetected).padEnd(38)}║`);
  logger.info(`║  Failed polls:      ${String(stats.failedCycles).padEnd(38)}║`);
  logger.info(`║  Failed deliveries: ${String(stats.deliveryFailures).padEnd(38)}║`);
  logger.info("╚═══════════════════════════════════════════════════════════╝");

  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
}

// Run!
main().catch((error) => {
  bootLogger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
