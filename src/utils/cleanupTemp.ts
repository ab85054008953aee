/**
 * Cleanup utility for downloaded artifacts
 * Backstop for files left behind by crashes; every pipeline run deletes its own artifact.
 */

import { readdir, rm, stat } from "fs/promises";
import path from "path";

export interface CleanupSummary {
  removedFiles: number;
  freedMB: number;
}

/**
 * Removes files in `downloadDir` older than maxAgeHours.
 * yt-dlp partial files (.part, .ytdl) are removed regardless of age.
 */
export async function cleanupTempFiles(downloadDir: string, maxAgeHours: number = 2): Promise<CleanupSummary> {
  const summary: CleanupSummary = { removedFiles: 0, freedMB: 0 };

  let entries: string[];
  try {
    entries = await readdir(downloadDir);
  } catch {
    console.log("[cleanup] No download directory found, nothing to clean");
    return summary;
  }

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  for (const entry of entries) {
    const filePath = path.join(downloadDir, entry);
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) continue;

      const ageMs = now - stats.mtimeMs;
      const isPartial = entry.endsWith(".part") || entry.endsWith(".ytdl");
      if (!isPartial && ageMs <= maxAgeMs) continue;

      await rm(filePath, { force: true });
      summary.removedFiles++;
      summary.freedMB += stats.size / (1024 * 1024);
      console.log(`[cleanup] Removed ${isPartial ? "partial" : "stale"} file: ${entry} (${(ageMs / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${summary.removedFiles} files, freed ${summary.freedMB.toFixed(0)}MB`);
  return summary;
}

/**
 * Get disk usage of the download directory
 */
export async function getTempDiskUsage(downloadDir: string): Promise<{ usedMB: number; files: number }> {
  let totalBytes = 0;
  let totalFiles = 0;

  try {
    for (const entry of await readdir(downloadDir)) {
      const stats = await stat(path.join(downloadDir, entry));
      if (!stats.isFile()) continue;
      totalBytes += stats.size;
      totalFiles++;
    }
  } catch (err) {
    console.error("[cleanup] Error calculating disk usage:", err);
  }

  return {
    usedMB: totalBytes / (1024 * 1024),
    files: totalFiles,
  };
}
