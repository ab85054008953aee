/**
 * Link Validation
 * Validates user supplied links against the download schema.
 */

import { downloadUrlSchema } from "./schemas/downloadSchema.js";

/**
 * Returns the normalized link, or null if the candidate is not a supported link.
 */
export function parseSupportedUrl(candidate: string): string | null {
  const result = downloadUrlSchema.safeParse(candidate);
  return result.success ? result.data : null;
}

/**
 * Finds the first supported link in free text.
 */
export function extractSupportedUrl(text: string): string | null {
  for (const token of text.split(/\s+/)) {
    if (!token) continue;
    const url = parseSupportedUrl(token);
    if (url) return url;
  }
  return null;
}
