/**
 * Delivery Collaborator Contracts
 */

import type { UserId } from "../services/business/sessionStore.js";

export interface DownloadResult {
  filePath: string;
  title: string;
  elapsedSeconds: number;
}

/**
 * Extracts media from a URL into a local file.
 * Implementations should watch `signal` and fail with a cancellation error once it aborts.
 */
export interface MediaFetcher {
  fetchAudio(url: string, signal: AbortSignal): Promise<DownloadResult>;
  fetchVideo(url: string, signal: AbortSignal): Promise<DownloadResult>;
}

/** Outbound side of the chat platform. Private chats use the user id as chat id. */
export interface ChatTransport {
  sendText(userId: UserId, text: string): Promise<void>;
  sendAudio(userId: UserId, filePath: string, caption: string): Promise<void>;
  sendVideo(userId: UserId, filePath: string, caption: string): Promise<void>;
}
