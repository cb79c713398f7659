import { createAbortError, isAbortError, mergeAbortSignals, waitWithAbort } from "../abort.js";
import {
  RateLimitedError,
  ServiceError,
  UpstreamOverloadedError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  UpstreamUnreachableError
} from "../errors.js";
import { GenerativeApiError, type CompletionClient, type CompletionRequest } from "./generativeClient.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  attemptTimeoutMs: number;
  attemptTimeoutStepMs: number;
  /** Retryable upstream status mapped to the exponent base of its backoff. */
  retryableStatuses: ReadonlyMap<number, number>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 2_000,
  attemptTimeoutMs: 30_000,
  attemptTimeoutStepMs: 15_000,
  retryableStatuses: new Map<number, number>([
    [503, 2],
    [429, 3]
  ])
});

const TRANSIENT_BACKOFF_BASE = 2;

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return Object.freeze({
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
    maxAttempts: Math.max(1, Math.floor(overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts))
  });
}

type AttemptFailure =
  | { type: "status"; status: number; message: string }
  | { type: "timeout" }
  | { type: "network"; message: string };

export interface CompletionRetryOptions {
  signal?: AbortSignal;
  label?: string;
  log?: (message: string) => void;
}

export function resolveAttemptTimeoutMs(policy: RetryPolicy, attemptIndex: number): number {
  return policy.attemptTimeoutMs + attemptIndex * policy.attemptTimeoutStepMs;
}

export function resolveBackoffMs(policy: RetryPolicy, exponentBase: number, attemptIndex: number): number {
  return policy.baseDelayMs * exponentBase ** attemptIndex;
}

export function isRetryableNetworkError(error: unknown): boolean {
  if (!(error instanceof Error) || isAbortError(error)) {
    return false;
  }

  const cause = error.cause instanceof Error ? ` ${error.cause.message}` : "";
  return /\b(fetch failed|network|socket|connection|econnreset|econnrefused|enotfound|etimedout)\b/i.test(
    `${error.message}${cause}`
  );
}

function classifyFailure(error: unknown, timedOut: boolean): AttemptFailure | null {
  if (timedOut) {
    return { type: "timeout" };
  }
  if (error instanceof GenerativeApiError) {
    return { type: "status", status: error.statusCode, message: error.message };
  }
  if (isRetryableNetworkError(error)) {
    return { type: "network", message: error instanceof Error ? error.message : String(error) };
  }
  return null;
}

function exhaustionError(failure: AttemptFailure): ServiceError {
  if (failure.type === "timeout") {
    return new UpstreamTimeoutError();
  }
  if (failure.type === "network") {
    return new UpstreamUnreachableError(`Unable to connect to AI service: ${failure.message}`);
  }
  if (failure.status === 503) {
    return new UpstreamOverloadedError();
  }
  if (failure.status === 429) {
    return new RateLimitedError();
  }
  return new UpstreamUnavailableError(`AI service is temporarily unavailable (${failure.status}): ${failure.message}`);
}

function describeFailure(failure: AttemptFailure): string {
  if (failure.type === "status") {
    return `status=${failure.status}`;
  }
  if (failure.type === "timeout") {
    return "attempt timed out";
  }
  return failure.message;
}

/**
 * Calls the completion client under the retry policy. Each attempt gets its own
 * timeout, growing by `attemptTimeoutStepMs` per attempt. A caller abort ends the loop
 * immediately and is rethrown as an AbortError.
 */
export async function requestCompletion(
  client: CompletionClient,
  request: CompletionRequest,
  policy: RetryPolicy,
  options: CompletionRetryOptions = {}
): Promise<string> {
  const log = options.log ?? ((message: string) => console.warn(`[upstream-retry] ${message}`));
  const label = options.label ?? "completion";

  for (let attemptIndex = 0; attemptIndex < policy.maxAttempts; attemptIndex += 1) {
    if (options.signal?.aborted) {
      throw createAbortError("Completion request aborted.");
    }

    const timeoutMs = resolveAttemptTimeoutMs(policy, attemptIndex);
    const attemptController = new AbortController();
    const timeout = setTimeout(() => {
      attemptController.abort(createAbortError(`Attempt timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    let outcome: { ok: true; text: string } | { ok: false; error: unknown; timedOut: boolean };
    try {
      outcome = {
        ok: true,
        text: await client.complete(request, {
          signal: mergeAbortSignals([options.signal, attemptController.signal])
        })
      };
    } catch (error) {
      outcome = { ok: false, error, timedOut: attemptController.signal.aborted };
    } finally {
      clearTimeout(timeout);
    }

    if (outcome.ok) {
      return outcome.text;
    }
    if (options.signal?.aborted) {
      throw createAbortError("Completion request aborted.");
    }
    if (outcome.error instanceof ServiceError) {
      throw outcome.error;
    }

    const failure = classifyFailure(outcome.error, outcome.timedOut);
    if (!failure) {
      throw outcome.error;
    }

    let exponentBase = TRANSIENT_BACKOFF_BASE;
    if (failure.type === "status") {
      const statusBase = policy.retryableStatuses.get(failure.status);
      if (statusBase === undefined) {
        throw new UpstreamRejectedError(failure.status, failure.message);
      }
      exponentBase = statusBase;
    }

    const attemptNumber = attemptIndex + 1;
    if (attemptNumber >= policy.maxAttempts) {
      log(`${label} failed after ${attemptNumber} attempt(s) (${describeFailure(failure)}).`);
      throw exhaustionError(failure);
    }

    const delayMs = resolveBackoffMs(policy, exponentBase, attemptIndex);
    log(
      `${label} attempt ${attemptNumber}/${policy.maxAttempts} failed (${describeFailure(failure)}); retrying in ${delayMs}ms.`
    );
    await waitWithAbort(delayMs, options.signal);
  }

  throw new UpstreamUnavailableError();
}
