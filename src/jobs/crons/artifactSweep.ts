/**
 * Artifact Sweep Cron Job
 * Scheduled removal of stale files in the download directory.
 */

import cron, { type ScheduledTask } from "node-cron";
import { cleanupTempFiles } from "../../utils/cleanupTemp.js";

/**
 * Starts the artifact sweep cron job.
 * Runs every 30 minutes.
 */
export function startArtifactSweepJob(downloadDir: string, maxAgeHours: number): ScheduledTask {
  // Schedule: "*/30 * * * *" = every 30th minute
  const task = cron.schedule("*/30 * * * *", async () => {
    console.log("[Artifact Sweep Job] Starting...");
    try {
      await cleanupTempFiles(downloadDir, maxAgeHours);
      console.log("[Artifact Sweep Job] ✓ Completed successfully");
    } catch (error) {
      console.error("[Artifact Sweep Job] ✗ Failed:", error);
    }
  });

  console.log("[Artifact Sweep Job] Scheduled (every 30 minutes)");
  return task;
}
