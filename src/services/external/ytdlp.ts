/**
 * YouTube Download Service
 * Downloads audio or video from YouTube by spawning yt-dlp.
 */

import { execa, ExecaError } from "execa";
import { mkdir, readdir, rm } from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { MediaKind } from "../../config/delivery.js";
import type { DownloadResult, MediaFetcher } from "../../types/delivery.js";
import { FetchCancelledError, FetchFailedError } from "../../utils/errors.js";

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

const metadataSchema = z.object({
  title: z.string().nullish().transform((title) => title ?? "Unknown"),
  duration: z.number().nullish(),
});

export interface YtDlpFetcherOptions {
  downloadDir: string;
  binaryPath?: string;
}

/** Flags selecting the output format per media kind. */
function formatArgs(kind: MediaKind): string[] {
  if (kind === "audio") {
    return ["--format", "bestaudio[ext=m4a]/bestaudio/best", "--extract-audio", "--audio-format", "mp3"];
  }
  return [
    "--format",
    "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best",
    "--merge-output-format",
    "mp4",
  ];
}

function isPartial(fileName: string): boolean {
  return fileName.endsWith(".part") || fileName.endsWith(".ytdl") || fileName.includes(".temp.");
}

/**
 * MediaFetcher backed by the yt-dlp binary.
 * The cancellation signal is handed to the child process: aborting kills yt-dlp.
 */
export class YtDlpFetcher implements MediaFetcher {
  private readonly downloadDir: string;
  private readonly binaryPath: string;

  constructor(options: YtDlpFetcherOptions) {
    this.downloadDir = options.downloadDir;
    this.binaryPath = options.binaryPath ?? "yt-dlp";
  }

  fetchAudio(url: string, signal: AbortSignal): Promise<DownloadResult> {
    return this.fetch(url, "audio", signal);
  }

  fetchVideo(url: string, signal: AbortSignal): Promise<DownloadResult> {
    return this.fetch(url, "video", signal);
  }

  private async fetch(url: string, kind: MediaKind, signal: AbortSignal): Promise<DownloadResult> {
    if (signal.aborted) {
      throw new FetchCancelledError();
    }

    await mkdir(this.downloadDir, { recursive: true });
    const jobId = randomUUID();
    const outputTemplate = path.join(this.downloadDir, `${jobId}.%(ext)s`);
    const startTime = Date.now();

    console.log(`[youtube-dl] Downloading ${kind} from: ${url}`);

    try {
      console.log(`[youtube-dl] Fetching metadata...`);
      const { stdout } = await execa(
        this.binaryPath,
        ["--dump-single-json", "--no-playlist", "--no-warnings", "--user-agent", USER_AGENT, url],
        { cancelSignal: signal }
      );
      const metadata = metadataSchema.parse(JSON.parse(stdout));
      console.log(`[youtube-dl] Title: ${metadata.title}`);
      if (metadata.duration) {
        console.log(`[youtube-dl] Duration: ${metadata.duration}s`);
      }

      await execa(
        this.binaryPath,
        [
          ...formatArgs(kind),
          "--no-playlist",
          "--no-progress",
          "--user-agent",
          USER_AGENT,
          "--output",
          outputTemplate,
          url,
        ],
        { cancelSignal: signal }
      );

      const filePath = await this.locateArtifact(jobId, kind);
      const elapsedSeconds = (Date.now() - startTime) / 1000;
      console.log(`[youtube-dl] ✓ Download completed in ${elapsedSeconds.toFixed(1)}s: ${filePath}`);

      return { filePath, title: metadata.title, elapsedSeconds };
    } catch (error) {
      await this.removeJobFiles(jobId);

      if (signal.aborted || (error instanceof ExecaError && error.isCanceled)) {
        console.log(`[youtube-dl] Download cancelled: ${url}`);
        throw new FetchCancelledError();
      }

      const details = error instanceof ExecaError ? error.stderr || error.shortMessage : String(error);
      console.error(`[youtube-dl] Error:`, details);
      throw new FetchFailedError(url, details);
    }
  }

  /**
   * Finds the finished file for a job. Falls back to the expected name so the
   * caller's existence check reports a missing artifact.
   */
  private async locateArtifact(jobId: string, kind: MediaKind): Promise<string> {
    const entries = await readdir(this.downloadDir);
    const match = entries.find((name) => name.startsWith(`${jobId}.`) && !isPartial(name));
    return path.join(this.downloadDir, match ?? `${jobId}.${kind === "audio" ? "mp3" : "mp4"}`);
  }

  private async removeJobFiles(jobId: string): Promise<void> {
    try {
      const entries = await readdir(this.downloadDir);
      await Promise.all(
        entries
          .filter((name) => name.startsWith(`${jobId}.`))
          .map((name) => rm(path.join(this.downloadDir, name), { force: true }))
      );
    } catch (err) {
      console.warn(`[youtube-dl] Failed to remove partial files for ${jobId}: ${err}`);
    }
  }
}
