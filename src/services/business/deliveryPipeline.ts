/**
 * Delivery Pipeline
 * Coordinates one download request end to end:
 * session → fetch → validate size → transmit → cleanup
 */

import { stat, rm } from "fs/promises";
import { MAX_FILE_SIZE_MB, type MediaKind } from "../../config/delivery.js";
import type { ChatTransport, DownloadResult, MediaFetcher } from "../../types/delivery.js";
import { BotMessages, describeFetchFailure } from "../../utils/errorMessages.js";
import { ArtifactMissingError, isCancellationError } from "../../utils/errors.js";
import { transmitWithRetry, type RetryOptions } from "../../utils/retry.js";
import { REJECTED, type SessionStore, type UserId } from "./sessionStore.js";

export interface DeliveryRequest {
  userId: UserId;
  url: string;
  kind: MediaKind;
}

export type DeliveryOutcome =
  | { kind: "sent" }
  | { kind: "tooLarge"; sizeMB: number }
  | { kind: "transmitFailed"; attempts: number };

export type PipelineOutcome =
  | DeliveryOutcome
  | { kind: "contention" }
  | { kind: "fetchCancelled" }
  | { kind: "fetchFailed"; reason: string }
  | { kind: "artifactMissing" };

export interface DeliveryPipelineOptions {
  maxFileSizeMB?: number;
  retry?: Omit<RetryOptions, "label">;
}

const BYTES_PER_MB = 1024 * 1024;

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export class DeliveryPipeline {
  private readonly maxFileSizeMB: number;
  private readonly retry: Omit<RetryOptions, "label">;

  constructor(
    private readonly sessions: SessionStore,
    private readonly fetcher: MediaFetcher,
    private readonly transport: ChatTransport,
    options: DeliveryPipelineOptions = {}
  ) {
    this.maxFileSizeMB = options.maxFileSizeMB ?? MAX_FILE_SIZE_MB;
    this.retry = options.retry ?? {};
  }

  /**
   * Runs one request to a terminal outcome. Never rejects: every failure is
   * reported to the user and returned as an outcome. The artifact is deleted
   * and the session released on every path.
   */
  async run(request: DeliveryRequest): Promise<PipelineOutcome> {
    const { userId, url, kind } = request;

    const signal = this.sessions.start(userId);
    if (signal === REJECTED) {
      await this.notify(userId, BotMessages.alreadyDownloading);
      return { kind: "contention" };
    }

    let artifactPath: string | null = null;

    try {
      console.log(`[pipeline] user ${userId} requested ${kind}: ${url}`);
      await this.notify(userId, BotMessages.downloading(kind));

      let download: DownloadResult;
      try {
        download = kind === "audio"
          ? await this.fetcher.fetchAudio(url, signal)
          : await this.fetcher.fetchVideo(url, signal);
      } catch (error) {
        if (signal.aborted || isCancellationError(error)) {
          console.log(`[pipeline] user ${userId} download cancelled`);
          await this.notify(userId, BotMessages.cancelled);
          return { kind: "fetchCancelled" };
        }

        const reason = describeFetchFailure(error);
        console.error(`[pipeline] ✗ ${kind} fetch failed for user ${userId} (${reason}):`, error);
        await this.notify(userId, BotMessages.failed);
        return { kind: "fetchFailed", reason };
      }

      artifactPath = download.filePath;

      const sizeBytes = await fileSize(artifactPath);
      if (sizeBytes === null) {
        console.error(`[pipeline] ✗ user ${userId}:`, new ArtifactMissingError(artifactPath));
        await this.notify(userId, BotMessages.fileNotFound);
        return { kind: "artifactMissing" };
      }

      const sizeMB = sizeBytes / BYTES_PER_MB;
      if (sizeMB > this.maxFileSizeMB) {
        console.log(`[pipeline] artifact too large for user ${userId}: ${sizeMB.toFixed(1)}MB`);
        await this.removeArtifact(artifactPath);
        await this.notify(userId, BotMessages.tooLarge(sizeMB, this.maxFileSizeMB));
        return { kind: "tooLarge", sizeMB };
      }

      const filePath = artifactPath;
      const caption = BotMessages.caption(kind, download.title);
      const delivery = await transmitWithRetry(
        () => kind === "audio"
          ? this.transport.sendAudio(userId, filePath, caption)
          : this.transport.sendVideo(userId, filePath, caption),
        { ...this.retry, label: kind }
      );

      if (delivery.kind === "transmitFailed") {
        await this.notify(userId, BotMessages.networkIssue);
        return { kind: "transmitFailed", attempts: delivery.attempts };
      }

      console.log(`[pipeline] ✓ delivered ${kind} to user ${userId} (${sizeMB.toFixed(1)}MB)`);
      await this.notify(userId, BotMessages.done(download.elapsedSeconds));
      return { kind: "sent" };
    } catch (error) {
      const reason = describeFetchFailure(error);
      console.error(`[pipeline] ✗ unexpected error for user ${userId}:`, error);
      await this.notify(userId, BotMessages.failed);
      return { kind: "fetchFailed", reason };
    } finally {
      if (artifactPath) {
        await this.removeArtifact(artifactPath);
      }
      this.sessions.finish(userId);
    }
  }

  /** Sends a status notice; delivery problems are logged by the retry helper. */
  private async notify(userId: UserId, text: string): Promise<void> {
    await transmitWithRetry(() => this.transport.sendText(userId, text), { ...this.retry, label: "text" });
  }

  private async removeArtifact(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (err) {
      console.warn(`[pipeline] Failed to remove artifact ${filePath}: ${err}`);
    }
  }
}
