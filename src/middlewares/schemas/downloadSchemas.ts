/**
 * Download Validation Schemas
 * Zod schemas for validating download and probe requests.
 */

import { z } from "zod";
import { ALLOWED_DOMAINS } from "../../config/env.js";
import { QUALITY_PROFILES } from "../../config/profiles.js";

/** Characters a shell would treat specially; never valid in a format selector */
const FORBIDDEN_FORMAT_CHARS = /[;&|`$()\n\r]/;

/**
 * True when the host is one of the allowed domains or a subdomain of one.
 * An empty allow-list accepts every host.
 */
export function isAllowedHost(hostname: string, allowedDomains: readonly string[] = ALLOWED_DOMAINS): boolean {
  if (allowedDomains.length === 0) {
    return true;
  }
  const host = hostname.toLowerCase().replace(/^www\./, "");
  return allowedDomains.some((domain) => {
    const allowed = domain.toLowerCase();
    return host === allowed || host.endsWith(`.${allowed}`);
  });
}

function parseHttpUrl(value: string): URL | null {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
}

export const mediaUrlSchema = z
  .string({ required_error: "URL is required" })
  .trim()
  .min(1, "URL is required")
  .max(2048, "URL is too long")
  .superRefine((value, ctx) => {
    const url = parseHttpUrl(value);
    if (!url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Provide a valid http(s) URL" });
      return;
    }
    if (!isAllowedHost(url.hostname)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported domain: ${url.hostname}` });
    }
  });

export const formatSelectorSchema = z
  .string()
  .trim()
  .min(1, "Invalid format specification")
  .max(500, "Invalid format specification")
  .refine((value) => !FORBIDDEN_FORMAT_CHARS.test(value), { message: "Invalid characters in format" });

/**
 * Schema for submitting a download.
 * `format` (from the probe endpoint) overrides `profile` when present.
 */
export const downloadRequestSchema = z.object({
  url: mediaUrlSchema,
  profile: z
    .enum(QUALITY_PROFILES, {
      errorMap: () => ({ message: `Profile must be one of: ${QUALITY_PROFILES.join(", ")}` }),
    })
    .default("best"),
  format: formatSelectorSchema.optional(),
});

export type DownloadRequestBody = z.infer<typeof downloadRequestSchema>;

/**
 * Schema for probing the formats of a URL.
 */
export const probeRequestSchema = z.object({
  url: mediaUrlSchema,
});

export type ProbeRequestBody = z.infer<typeof probeRequestSchema>;
