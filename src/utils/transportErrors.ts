/**
 * Transport Error Classification
 * Decides which send failures are worth retrying.
 */

import { HttpError } from "grammy";

const TRANSIENT_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TRANSIENT_NAMES = new Set(["AbortError", "TimeoutError"]);

function hasTransientCode(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;
  return TRANSIENT_NAMES.has(error.name);
}

/**
 * True for timeouts and unreachable-network failures.
 * grammY wraps every network-layer failure in an HttpError; Telegram API
 * rejections (GrammyError) are permanent.
 */
export function isTransientTransportError(error: unknown): boolean {
  if (error instanceof HttpError) return true;
  if (hasTransientCode(error)) return true;
  if (error instanceof Error && error.cause !== undefined) {
    return hasTransientCode(error.cause);
  }
  return false;
}
