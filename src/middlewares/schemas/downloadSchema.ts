/**
 * Download Link Validation Schema
 * Zod schema accepting http(s) links on a supported host.
 */

import { z } from "zod";
import { SUPPORTED_DOMAINS } from "../../config/delivery.js";

/** True when the hostname is a supported domain or one of its subdomains. */
export function isSupportedHost(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^www\./, "");
  return SUPPORTED_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export const downloadUrlSchema = z
  .string()
  .trim()
  .min(1, "Link is empty")
  .transform((value) => (/^https?:\/\//i.test(value) ? value : `https://${value}`))
  .superRefine((value, ctx) => {
    const parsed = tryParseUrl(value);
    if (!parsed || (parsed.protocol !== "https:" && parsed.protocol !== "http:")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Must be a valid URL" });
      return;
    }
    if (!isSupportedHost(parsed.hostname)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Only YouTube links are supported" });
      return;
    }
    if (parsed.pathname.length <= 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Link has no video path" });
    }
  });
