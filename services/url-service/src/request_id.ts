import type { IncomingHttpHeaders } from "http";
import { randomUUID } from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Reuse the caller's X-Request-Id when it is non-empty and at most 128
 * characters after trimming; otherwise mint a UUID.
 */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const incoming = Array.isArray(raw) ? raw[0] : raw;

  const trimmed = (incoming ?? "").trim();
  if (trimmed.length > 0 && trimmed.length <= 128) {
    return trimmed;
  }

  return randomUUID();
}
