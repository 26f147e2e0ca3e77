// Error classification for the Assistants API.
//
// Two sources:
//   Transport errors: the request never got an answer (DNS, refused, reset)
//   HTTP errors: the server answered with a non-2xx status

import type { ProviderErrorCode } from "@docent/core";

/** Map a thrown fetch/network error to a normalized ProviderErrorCode. */
export function classifyError(err: unknown): ProviderErrorCode {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    const cause = err.cause instanceof Error ? err.cause.message.toLowerCase() : "";
    const text = `${msg} ${cause}`;

    if (
      text.includes("econnrefused") ||
      text.includes("econnreset") ||
      text.includes("enotfound") ||
      text.includes("etimedout") ||
      text.includes("network") ||
      text.includes("fetch failed") ||
      text.includes("socket")
    ) {
      return "transient_network";
    }
  }
  return "unknown";
}

/** Map an HTTP status to a normalized ProviderErrorCode. */
export function classifyStatus(status: number): ProviderErrorCode {
  if (status === 401 || status === 403) return "auth_failed";
  if (status === 404) return "not_found";
  if (status === 429) return "throttled";
  if (status === 400 || status === 409 || status === 422) return "invalid_request";
  if (status >= 500) return "server_error";
  return "unknown";
}
