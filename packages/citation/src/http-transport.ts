/**
 * @zoneledger/citation — HTTP transport to remote Zones.
 *
 * Wraps fetch() with:
 * - Per-request timeout (AbortController)
 * - Retry with exponential backoff for network errors and 5xx, cut short
 *   when the citation check's signal fires
 * - Error normalization to RemoteNotFoundError / UnreachableCollaboratorError
 * - Payload validation (zod)
 *
 * Expects the remote Zone's `GET /attestation/:id` contract:
 *   { "data": { "attestation": {...}, "proof": {...}, "anchor"?: {...} } }
 *
 * Design:
 * - Custom fetch function for testing
 * - 4xx other than 404 and malformed payloads are not retried
 */

import {
  RemoteNotFoundError,
  UnreachableCollaboratorError,
} from "@zoneledger/types";
import { DEFAULT_RETRY_POLICY, pause, retryTransient } from "./retry.js";
import type { Pause, RetryPolicy } from "./retry.js";
import { CitedRecordSchema } from "./schemas.js";
import type { CitedRecord, ZoneTransport } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/** Unwrap the `{ data }` envelope when present */
function unwrapData(body: unknown): unknown {
  if (body !== null && typeof body === "object" && "data" in body) {
    return (body as Record<string, unknown>).data;
  }
  return body;
}

/** Retryable failure: network error, timeout or 5xx */
class TransientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransientError";
  }
}

// =============================================================================
// Transport
// =============================================================================

export interface HttpZoneTransportOptions {
  /** Per-request timeout in ms. Default: 10000 */
  readonly timeoutMs?: number | undefined;
  /** Retry behaviour for transient failures */
  readonly retry?: Partial<RetryPolicy> | undefined;
  /** fetch implementation (injectable for testing) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Pause between retries (injectable for testing) */
  readonly pause?: Pause | undefined;
}

export class HttpZoneTransport implements ZoneTransport {
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: typeof fetch;
  private readonly pause: Pause;

  constructor(options: HttpZoneTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.pause = options.pause ?? pause;
  }

  async fetchCited(
    endpoint: string,
    attestationId: string,
    signal?: AbortSignal,
  ): Promise<CitedRecord> {
    const url = `${endpoint.replace(/\/+$/, "")}/attestation/${encodeURIComponent(attestationId)}`;

    try {
      return await retryTransient(() => this.fetchOnce(url, endpoint, attestationId, signal), {
        policy: this.retry,
        isTransient: (err) => err instanceof TransientError,
        signal,
        pause: this.pause,
      });
    } catch (err) {
      if (err instanceof RemoteNotFoundError || err instanceof UnreachableCollaboratorError) {
        throw err;
      }
      throw new UnreachableCollaboratorError(
        endpoint,
        `Zone at ${endpoint} did not answer: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  private async fetchOnce(
    url: string,
    endpoint: string,
    attestationId: string,
    signal: AbortSignal | undefined,
  ): Promise<CitedRecord> {
    const response = await this.fetchWithTimeout(url, signal);
    const body = await parseResponseBody(response);

    if (response.status === 404) {
      throw new RemoteNotFoundError(endpoint, attestationId);
    }
    if (response.status >= 500) {
      throw new TransientError(`HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new UnreachableCollaboratorError(
        endpoint,
        `Zone at ${endpoint} rejected the request with HTTP ${response.status}`,
      );
    }

    const parsed = CitedRecordSchema.safeParse(unwrapData(body));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new UnreachableCollaboratorError(
        endpoint,
        `Zone at ${endpoint} sent a malformed record: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim(),
      );
    }
    return parsed.data;
  }

  /**
   * Fetch with a timeout using AbortController. An outer signal aborts too.
   */
  private async fetchWithTimeout(url: string, signal: AbortSignal | undefined): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransientError(
          signal?.aborted === true
            ? "Request cancelled"
            : `Request timed out after ${this.timeoutMs}ms`,
        );
      }
      throw new TransientError(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
