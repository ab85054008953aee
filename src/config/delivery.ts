/**
 * Delivery Configuration
 * Fixed limits for fetching and transmitting media.
 */

/** Telegram bot API attachment ceiling. */
export const MAX_FILE_SIZE_MB = 50;

/** Transmission retry policy. */
export const RETRY_MAX_ATTEMPTS = 3;
export const RETRY_BACKOFF_MS = 2000;

/** Hosts accepted by URL validation (subdomains included, "www." ignored). */
export const SUPPORTED_DOMAINS = ["youtube.com", "youtu.be"] as const;

export type MediaKind = "audio" | "video";
