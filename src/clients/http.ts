/**
 * JSON-over-HTTP helper shared by the platform clients.
 *
 * Performs a request with retry logic for:
 *   - Rate-limit errors (as classified by the platform) → wait and retry
 *   - Server errors (HTTP 5xx) → exponential backoff + jitter
 *   - Network failures (ECONNRESET, fetch failures) → exponential backoff + jitter
 *
 * Throws immediately (no retry) for:
 *   - Authentication errors (expired token, missing permissions)
 *   - Other client errors (bad request, invalid query, etc.)
 *   - Responses that do not match the expected schema
 *
 * Every wait is cut short when the caller's AbortSignal fires.
 */

import type { z } from "zod";
import { MAX_RETRIES } from "../config";
import { AuthenticationError, PlatformError, RateLimitError } from "../errors";
import type { Platform } from "../types";

export interface JsonRequestOptions<T> {
  platform: Platform;
  /** Validates the successful response body */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Maps an error body to a typed error, or null when the body is not an error */
  classifyError: (response: Response, body: unknown) => PlatformError | null;
  init?: RequestInit;
  signal?: AbortSignal;
  maxRetries?: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Resolves after `ms`, or rejects with the abort reason if `signal` fires first */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Computes a backoff delay with jitter for retry attempts.
 *
 * Exponential backoff (2^attempt seconds) plus a random jitter of 0–1s, so
 * clients that were throttled together do not all retry at the same moment.
 */
export function backoffWithJitter(attempt: number): number {
  const base = 2 ** attempt * 1000; // 2s, 4s, 8s…
  const jitter = Math.random() * 1000;
  return base + jitter;
}

function isNetworkError(err: Error): boolean {
  return err.message.includes("fetch failed") || err.message.includes("ECONNRESET");
}

// ─── Request with retry ──────────────────────────────────────────────────────

export async function fetchJsonWithRetry<T>(
  url: string,
  options: JsonRequestOptions<T>
): Promise<T> {
  const { platform, schema, classifyError, signal } = options;
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();

    try {
      const response = await fetch(url, { ...options.init, signal });

      // Parse the body for ALL responses (including 5xx): platforms put the
      // error code we classify on inside the JSON body.
      let body: unknown;
      try {
        body = await response.json();
      } catch {
        if (response.status >= 500) {
          const backoff = backoffWithJitter(attempt);
          console.warn(
            `⚠  ${platform}: server error ${response.status} (attempt ${attempt}/${maxRetries}). ` +
              `Retrying in ${(backoff / 1000).toFixed(1)}s…`
          );
          lastError = new PlatformError(
            `Server error ${response.status} (non-JSON body)`,
            platform,
            response.status
          );
          await sleep(backoff, signal);
          continue;
        }
        throw new PlatformError(
          `HTTP ${response.status}: non-JSON response`,
          platform,
          response.status
        );
      }

      const apiError = classifyError(response, body);

      // ── Rate limit – wait as long as the platform asks, then retry ──────
      if (apiError instanceof RateLimitError) {
        console.warn(
          `⚠  ${platform}: ${apiError.name} (code ${apiError.code ?? "none"}). ` +
            `Message: "${apiError.message}". ` +
            `Waiting ${Math.round(apiError.retryAfterMs / 1000)}s before retry ` +
            `(attempt ${attempt}/${maxRetries})…`
        );
        lastError = apiError;
        await sleep(apiError.retryAfterMs, signal);
        continue;
      }

      // ── Server error with a JSON body – back off and retry ──────────────
      if (apiError && response.status >= 500 && !(apiError instanceof AuthenticationError)) {
        const backoff = backoffWithJitter(attempt);
        console.warn(
          `⚠  ${platform}: ${apiError.message} (attempt ${attempt}/${maxRetries}). ` +
            `Retrying in ${(backoff / 1000).toFixed(1)}s…`
        );
        lastError = apiError;
        await sleep(backoff, signal);
        continue;
      }

      // ── Auth and other API errors – throw immediately ───────────────────
      if (apiError) {
        throw apiError;
      }

      if (!response.ok) {
        throw new PlatformError(
          `HTTP error ${response.status}: ${JSON.stringify(body)}`,
          platform,
          response.status
        );
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new PlatformError(
          `Unexpected ${platform} response shape: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
          platform,
          "INVALID_RESPONSE"
        );
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof PlatformError || signal?.aborted) {
        throw err;
      }

      lastError = err instanceof Error ? err : new Error(String(err));

      if (isNetworkError(lastError)) {
        const backoff = backoffWithJitter(attempt);
        console.warn(
          `⚠  ${platform}: network error (attempt ${attempt}/${maxRetries}): ${lastError.message}. ` +
            `Retrying in ${(backoff / 1000).toFixed(1)}s…`
        );
        await sleep(backoff, signal);
        continue;
      }

      throw lastError;
    }
  }

  throw new PlatformError(
    `Failed after ${maxRetries} attempts. Last error: ${lastError?.message}`,
    platform,
    "RETRIES_EXHAUSTED"
  );
}
