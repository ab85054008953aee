/**
 * Transmission Retry Helper
 * Retries a send operation on transient transport failures.
 */

import { RETRY_BACKOFF_MS, RETRY_MAX_ATTEMPTS } from "../config/delivery.js";
import { isTransientTransportError } from "./transportErrors.js";

export type TransmitResult =
  | { kind: "sent"; attempts: number }
  | { kind: "transmitFailed"; attempts: number };

export interface RetryOptions {
  maxAttempts?: number;
  backoffMs?: number;
  isTransient?: (error: unknown) => boolean;
  /** Log tag identifying the payload, e.g. "audio". */
  label?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Attempts `sendFn` up to `maxAttempts` times, waiting `backoffMs` between
 * attempts. Never throws: exhaustion and permanent errors come back as
 * `transmitFailed`.
 */
export async function transmitWithRetry(
  sendFn: () => Promise<unknown>,
  options: RetryOptions = {}
): Promise<TransmitResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_MAX_ATTEMPTS);
  const backoffMs = options.backoffMs ?? RETRY_BACKOFF_MS;
  const isTransient = options.isTransient ?? isTransientTransportError;
  const label = options.label ?? "send";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await sendFn();
      return { kind: "sent", attempts: attempt };
    } catch (error) {
      if (!isTransient(error)) {
        console.error(`[retry] ✗ ${label} failed with a permanent error on attempt ${attempt}:`, error);
        return { kind: "transmitFailed", attempts: attempt };
      }

      if (attempt === maxAttempts) {
        console.error(`[retry] ✗ ${label} failed after ${attempt} attempts:`, error);
        break;
      }

      console.warn(`[retry] ${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${backoffMs}ms: ${String(error)}`);
      await sleep(backoffMs);
    }
  }

  return { kind: "transmitFailed", attempts: maxAttempts };
}
