/**
 * Removes leftover artifacts from the download directory.
 *
 * Usage:
 *   npm run clean:downloads            # files older than ARTIFACT_MAX_AGE_HOURS
 *   npm run clean:downloads -- --all   # every file
 */

import "dotenv/config";
import path from "path";
import { cleanupTempFiles, getTempDiskUsage } from "../src/utils/cleanupTemp.js";

async function main() {
  const downloadDir = path.resolve(process.env.DOWNLOAD_DIR || path.join(process.cwd(), "downloads"));
  const maxAgeHours = process.argv.includes("--all") ? 0 : Number(process.env.ARTIFACT_MAX_AGE_HOURS || "2");

  const before = await getTempDiskUsage(downloadDir);
  console.log(`📊 ${downloadDir}: ${before.usedMB.toFixed(1)}MB in ${before.files} files`);

  const summary = await cleanupTempFiles(downloadDir, maxAgeHours);

  console.log(`✅ Removed ${summary.removedFiles} files (${summary.freedMB.toFixed(1)}MB)`);
}

main().catch((error) => {
  console.error("❌ Cleanup failed:", error);
  process.exit(1);
});
