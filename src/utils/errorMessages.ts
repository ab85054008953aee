/**
 * Error Message Utility
 * User-facing notices and log-friendly failure summaries.
 */

import type { MediaKind } from "../config/delivery.js";

export const BotMessages = {
  welcome:
    "👋 Welcome to YouTube Downloader Bot!\n\n" +
    "Send me a YouTube link to download audio or video!\n\n" +
    "Commands:\n" +
    "/audio <url> - Download audio\n" +
    "/video <url> - Download video\n" +
    "/stop - Cancel download",
  invalidLink: "Please send a valid YouTube link.",
  notAllowed: "⛔ You are not allowed to use this bot.",
  alreadyDownloading: "⏳ You already have a download in progress. Send /stop to cancel it.",
  stopped: "⏹️ Download stopped",
  nothingToStop: "No active download to stop",
  cancelled: "⏹️ Download cancelled",
  failed: "❌ Download failed",
  fileNotFound: "❌ File not found after download",
  networkIssue: "⚠️ Network issue while sending the file, please retry.",
  usage: (kind: MediaKind) => `Usage: /${kind} <YouTube URL>`,
  downloading: (kind: MediaKind) => `⏳ Downloading ${kind}...`,
  tooLarge: (sizeMB: number, maxMB: number) =>
    `❌ File too large (${sizeMB.toFixed(1)}MB). Max ${maxMB}MB.`,
  done: (elapsedSeconds: number) => `✅ Done in ${elapsedSeconds.toFixed(1)}s`,
  caption: (kind: MediaKind, title: string) => `${kind === "audio" ? "🎧" : "🎥"} ${title}`,
} as const;

/**
 * Converts a technical fetch error into a short reason for logs.
 * Never shown to users.
 */
export function describeFetchFailure(error: unknown): string {
  const errorStr = String(error).toLowerCase();

  if (errorStr.includes("unavailable") || errorStr.includes("not available") || errorStr.includes("404")) {
    return "Video unavailable";
  }
  if (errorStr.includes("private") || errorStr.includes("403")) {
    return "Video is private";
  }
  if (errorStr.includes("copyright") || errorStr.includes("blocked")) {
    return "Video blocked";
  }
  if (errorStr.includes("unsupported url")) {
    return "Unsupported URL";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Fetch timeout";
  }
  if (errorStr.includes("enoent")) {
    return "yt-dlp binary not found";
  }

  return "Download failed";
}
