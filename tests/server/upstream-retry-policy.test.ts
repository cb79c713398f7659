import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import {
  AiNotConfiguredError,
  RateLimitedError,
  UpstreamOverloadedError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  UpstreamUnreachableError
} from "../../server/errors.js";
import {
  GenerativeApiError,
  type CompletionCallOptions,
  type CompletionClient,
  type CompletionRequest
} from "../../server/providers/generativeClient.js";
import {
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  requestCompletion,
  resolveAttemptTimeoutMs,
  resolveBackoffMs
} from "../../server/providers/retryPolicy.js";

const request: CompletionRequest = {
  prompt: "prompt",
  settings: { temperature: 0.1, topK: 20, topP: 0.8, maxOutputTokens: 2048 }
};

type CompleteFn = (request: CompletionRequest, options?: CompletionCallOptions) => Promise<string>;

function createClient(complete: CompleteFn): CompletionClient & { complete: Mock<CompleteFn> } {
  return {
    isConfigured: () => true,
    complete: vi.fn(complete)
  };
}

describe("upstream retry policy", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("computes per-attempt timeouts and backoff", () => {
    expect(resolveAttemptTimeoutMs(DEFAULT_RETRY_POLICY, 0)).toBe(30_000);
    expect(resolveAttemptTimeoutMs(DEFAULT_RETRY_POLICY, 2)).toBe(60_000);
    expect(resolveBackoffMs(DEFAULT_RETRY_POLICY, 2, 1)).toBe(4_000);
    expect(resolveBackoffMs(DEFAULT_RETRY_POLICY, 3, 1)).toBe(6_000);
    expect(createRetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
  });

  it("retries 503 three times with doubling waits, then reports overload", async () => {
    const client = createClient(async () => {
      throw new GenerativeApiError(503, "The model is overloaded.");
    });
    const log = vi.fn();

    const pending = requestCompletion(client, request, DEFAULT_RETRY_POLICY, { label: "test", log });
    const assertion = expect(pending).rejects.toBeInstanceOf(UpstreamOverloadedError);

    await vi.advanceTimersByTimeAsync(1_999);
    expect(client.complete).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(client.complete).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(3_999);
    expect(client.complete).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);

    await assertion;
    expect(client.complete).toHaveBeenCalledTimes(3);
    expect(log.mock.calls.map(([message]) => message)).toEqual([
      "test attempt 1/3 failed (status=503); retrying in 2000ms.",
      "test attempt 2/3 failed (status=503); retrying in 4000ms.",
      "test failed after 3 attempt(s) (status=503)."
    ]);
  });

  it("backs off faster on 429 and reports a rate limit", async () => {
    const client = createClient(async () => {
      throw new GenerativeApiError(429, "Quota exceeded.");
    });
    const log = vi.fn();

    const pending = requestCompletion(client, request, DEFAULT_RETRY_POLICY, { log });
    const assertion = expect(pending).rejects.toBeInstanceOf(RateLimitedError);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(client.complete).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(5_999);
    expect(client.complete).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);

    await assertion;
    expect(client.complete).toHaveBeenCalledTimes(3);
    expect(log.mock.calls[1]?.[0]).toBe("completion attempt 2/3 failed (status=429); retrying in 6000ms.");
  });

  it("does not retry statuses outside the retryable set", async () => {
    const client = createClient(async () => {
      throw new GenerativeApiError(400, "API key not valid.");
    });

    const error = await requestCompletion(client, request, DEFAULT_RETRY_POLICY, { log: vi.fn() }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(UpstreamRejectedError);
    expect(error).toMatchObject({
      statusCode: 502,
      upstreamStatus: 400,
      message: "AI service error (400): API key not valid."
    });
    expect(client.complete).toHaveBeenCalledTimes(1);
  });

  it("returns the first successful completion", async () => {
    let calls = 0;
    const client = createClient(async () => {
      calls += 1;
      if (calls === 1) {
        throw new GenerativeApiError(503, "busy");
      }
      return "ok";
    });

    const pending = requestCompletion(client, request, DEFAULT_RETRY_POLICY, { log: vi.fn() });
    await vi.advanceTimersByTimeAsync(2_000);

    await expect(pending).resolves.toBe("ok");
    expect(client.complete).toHaveBeenCalledTimes(2);
  });

  it("gives each attempt a growing timeout", async () => {
    const client = createClient(
      (_request, options) =>
        new Promise<string>((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => reject(options.signal?.reason), { once: true });
        })
    );
    const policy = createRetryPolicy({
      maxAttempts: 2,
      baseDelayMs: 100,
      attemptTimeoutMs: 1_000,
      attemptTimeoutStepMs: 500
    });

    const pending = requestCompletion(client, request, policy, { log: vi.fn() });
    const assertion = expect(pending).rejects.toBeInstanceOf(UpstreamTimeoutError);

    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(100);
    expect(client.complete).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1_499);
    await vi.advanceTimersByTimeAsync(1);

    await assertion;
    expect(client.complete).toHaveBeenCalledTimes(2);
  });

  it("stops waiting when the caller aborts", async () => {
    const client = createClient(async () => {
      throw new GenerativeApiError(503, "busy");
    });
    const controller = new AbortController();

    const pending = requestCompletion(client, request, DEFAULT_RETRY_POLICY, {
      signal: controller.signal,
      log: vi.fn()
    });
    const assertion = expect(pending).rejects.toMatchObject({ name: "AbortError" });

    await vi.advanceTimersByTimeAsync(0);
    controller.abort();

    await assertion;
    expect(client.complete).toHaveBeenCalledTimes(1);
  });

  it("reports unreachable upstreams after network failures", async () => {
    const client = createClient(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      requestCompletion(client, request, createRetryPolicy({ maxAttempts: 1 }), { log: vi.fn() })
    ).rejects.toMatchObject({
      name: "UpstreamUnreachableError",
      message: "Unable to connect to AI service: fetch failed"
    });
    await expect(
      requestCompletion(client, request, createRetryPolicy({ maxAttempts: 1 }), { log: vi.fn() })
    ).rejects.toBeInstanceOf(UpstreamUnreachableError);
  });

  it("rethrows service errors and unclassified failures untouched", async () => {
    const notConfigured = createClient(async () => {
      throw new AiNotConfiguredError();
    });
    await expect(requestCompletion(notConfigured, request, DEFAULT_RETRY_POLICY)).rejects.toBeInstanceOf(
      AiNotConfiguredError
    );
    expect(notConfigured.complete).toHaveBeenCalledTimes(1);

    const broken = createClient(async () => {
      throw new Error("boom");
    });
    await expect(requestCompletion(broken, request, DEFAULT_RETRY_POLICY)).rejects.toThrow("boom");
    expect(broken.complete).toHaveBeenCalledTimes(1);
  });
});
