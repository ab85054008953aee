/**
 * Graceful Shutdown
 * Ordering matters: polling stops first so no download starts while the
 * active ones are being cancelled and cleaned up.
 */

import type { DownloadController } from "../controllers/downloadController.js";
import type { SessionStore } from "../services/business/sessionStore.js";

export interface ShutdownDeps {
  stopPolling: () => Promise<void>;
  stopJobs: () => void;
  sessions: SessionStore;
  controller: DownloadController;
}

export async function gracefulShutdown({ stopPolling, stopJobs, sessions, controller }: ShutdownDeps): Promise<void> {
  stopJobs();
  await stopPolling();

  const cancelled = sessions.cancelAll();
  if (cancelled > 0) {
    console.log(`[shutdown] Cancelled ${cancelled} active downloads`);
  }
  await controller.drain();
  console.log("[shutdown] ✓ Active downloads settled");
}
