import { afterEach, describe, expect, it, vi } from "vitest";

import { AiNotConfiguredError } from "../../server/errors.js";
import {
  createCompletionClient,
  DEFAULT_GENERATIVE_API_URL,
  extractApiErrorMessage,
  GenerativeApiError
} from "../../server/providers/generativeClient.js";

const settings = { temperature: 0.3, topK: 40, topP: 0.95, maxOutputTokens: 2048 };

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("generative completion client", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the prompt with generation settings and joins candidate parts", async () => {
    const fetchMock = stubFetch(
      200,
      JSON.stringify({ candidates: [{ content: { parts: [{ text: "Hello " }, { text: "world" }] } }] })
    );
    const client = createCompletionClient({ apiKey: "test-key" });

    await expect(client.complete({ prompt: "prompt text", settings })).resolves.toBe("Hello world");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(DEFAULT_GENERATIVE_API_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "X-goog-api-key": "test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      contents: [{ parts: [{ text: "prompt text" }] }],
      generationConfig: settings
    });
  });

  it("uses a configured endpoint", async () => {
    const fetchMock = stubFetch(200, JSON.stringify({ candidates: [] }));
    const client = createCompletionClient({ apiKey: "test-key", apiUrl: "http://localhost:9999/generate" });

    await expect(client.complete({ prompt: "p", settings })).resolves.toBe("");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:9999/generate");
  });

  it("raises the upstream status with the provider message", async () => {
    stubFetch(429, JSON.stringify({ error: { code: 429, message: "Quota exceeded" } }));
    const client = createCompletionClient({ apiKey: "test-key" });

    const error = await client.complete({ prompt: "p", settings }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerativeApiError);
    expect(error).toMatchObject({ statusCode: 429, message: "Quota exceeded" });
  });

  it("returns an empty completion when a 200 body is not JSON", async () => {
    stubFetch(200, "<html>oops</html>");
    const client = createCompletionClient({ apiKey: "test-key" });

    await expect(client.complete({ prompt: "p", settings })).resolves.toBe("");
  });

  it("describes upstream failures without a JSON envelope", () => {
    expect(extractApiErrorMessage(500, "")).toBe("Upstream responded with 500.");
    expect(extractApiErrorMessage(502, "  Bad gateway  ")).toBe("Bad gateway");
  });

  it("is disabled without an API key", async () => {
    const fetchMock = stubFetch(200, "{}");
    const client = createCompletionClient({ apiKey: "   " });

    expect(client.isConfigured()).toBe(false);
    await expect(client.complete({ prompt: "p", settings })).rejects.toBeInstanceOf(AiNotConfiguredError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
