/**
 * Bot Entry Point
 * Starts the Telegram bot (long polling) and the health server.
 * Handles graceful shutdown on SIGTERM/SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { Bot, GrammyError } from "grammy";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { initializeApp } from "./config/init.js";
import { gracefulShutdown } from "./config/shutdown.js";
import { configureBot } from "./config/telegram.js";
import { DownloadController } from "./controllers/downloadController.js";
import { startArtifactSweepJob } from "./jobs/crons/artifactSweep.js";
import { DeliveryPipeline } from "./services/business/deliveryPipeline.js";
import { SessionStore } from "./services/business/sessionStore.js";
import { TelegramTransport } from "./services/external/telegram.js";
import { YtDlpFetcher } from "./services/external/ytdlp.js";

const config = loadConfig();

const bot = new Bot(config.botToken);
const sessions = new SessionStore();
const pipeline = new DeliveryPipeline(
  sessions,
  new YtDlpFetcher({ downloadDir: config.downloadDir, binaryPath: config.ytdlpPath }),
  new TelegramTransport(bot.api)
);
const controller = new DownloadController(sessions, pipeline);
configureBot(bot, { allowedUserIds: config.allowedUserIds, controller });

/** Tracks whether the bot is polling. */
let isReady = false;

/** HTTP server exposing health endpoints. */
const server = createServer(createApp(() => ({ ready: isReady, activeDownloads: sessions.size })));

server.listen(config.port, "0.0.0.0", () => {
  console.log(`Health server running on 0.0.0.0:${config.port}`);
});

const sweepJob = startArtifactSweepJob(config.downloadDir, config.artifactMaxAgeHours);

initializeApp(config)
  .then(() =>
    bot.start({
      drop_pending_updates: true,
      onStart: (botInfo) => {
        isReady = true;
        console.log(`✅ Bot @${botInfo.username} is running with polling...`);
      },
    })
  )
  .catch((error: unknown) => {
    if (error instanceof GrammyError && error.error_code === 409) {
      console.error(`❌ Conflict error: ${error.description}`);
      console.error("Please make sure only one bot instance is running");
    } else {
      console.error("✗ Bot failed to start:", error);
    }
    process.exit(1);
  });

async function shutdown(signal: string): Promise<void> {
  console.log(`[shutdown] ${signal} received`);
  isReady = false;

  await gracefulShutdown({
    stopPolling: async () => {
      if (bot.isRunning()) {
        await bot.stop();
      }
    },
    stopJobs: () => sweepJob.stop(),
    sessions,
    controller,
  });

  server.close(() => process.exit(0));
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[shutdown] ✗ Failed:", error);
      process.exit(1);
    });
  });
}
