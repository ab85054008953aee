/**
 * Application Initialization
 * Prepares the download directory on startup.
 */

import { mkdir } from "fs/promises";
import { cleanupTempFiles, getTempDiskUsage } from "../utils/cleanupTemp.js";
import type { AppConfig } from "./env.js";

/**
 * Initializes application dependencies on startup.
 * Removes artifacts left by a previous crash.
 */
export async function initializeApp(config: AppConfig): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(config.downloadDir, { recursive: true });

    const usage = await getTempDiskUsage(config.downloadDir);
    console.log(`[init] Download dir usage: ${usage.usedMB.toFixed(0)}MB (${usage.files} files)`);
    if (usage.files > 0) {
      await cleanupTempFiles(config.downloadDir, config.artifactMaxAgeHours);
    }

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
