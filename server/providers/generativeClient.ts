import { AiNotConfiguredError } from "../errors.js";
import { isRecord } from "../parsing/guards.js";

export const DEFAULT_GENERATIVE_API_URL =
  "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent";

export interface GenerationSettings {
  temperature: number;
  topK: number;
  topP: number;
  maxOutputTokens: number;
}

export interface CompletionRequest {
  prompt: string;
  settings: GenerationSettings;
}

export interface CompletionCallOptions {
  signal?: AbortSignal;
}

export interface CompletionClient {
  isConfigured(): boolean;
  /** Resolves with the joined candidate text, or an empty string when the model returned none. */
  complete(request: CompletionRequest, options?: CompletionCallOptions): Promise<string>;
}

export interface CompletionClientConfig {
  apiKey: string;
  apiUrl?: string;
}

export class GenerativeApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "GenerativeApiError";
    this.statusCode = statusCode;
  }
}

export function extractApiErrorMessage(statusCode: number, bodyText: string): string {
  try {
    const payload: unknown = JSON.parse(bodyText);
    if (isRecord(payload) && isRecord(payload.error) && typeof payload.error.message === "string") {
      const message = payload.error.message.trim();
      if (message.length > 0) {
        return message;
      }
    }
  } catch {
    // Not a JSON envelope; fall through to the raw body.
  }

  const snippet = bodyText.trim().slice(0, 200);
  return snippet.length > 0 ? snippet : `Upstream responded with ${statusCode}.`;
}

export function extractCandidateText(payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.candidates)) {
    return "";
  }

  const [candidate] = payload.candidates;
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return "";
  }

  return candidate.content.parts
    .map((part) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
    .join("");
}

class DisabledCompletionClient implements CompletionClient {
  isConfigured(): boolean {
    return false;
  }

  async complete(): Promise<string> {
    throw new AiNotConfiguredError();
  }
}

class HttpCompletionClient implements CompletionClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;

  constructor(config: CompletionClientConfig) {
    this.apiKey = config.apiKey.trim();
    this.apiUrl = (config.apiUrl ?? "").trim() || DEFAULT_GENERATIVE_API_URL;
  }

  isConfigured(): boolean {
    return true;
  }

  async complete(request: CompletionRequest, options: CompletionCallOptions = {}): Promise<string> {
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-goog-api-key": this.apiKey
      },
      body: JSON.stringify({
        contents: [
          {
            parts: [{ text: request.prompt }]
          }
        ],
        generationConfig: {
          temperature: request.settings.temperature,
          topK: request.settings.topK,
          topP: request.settings.topP,
          maxOutputTokens: request.settings.maxOutputTokens
        }
      }),
      signal: options.signal
    });

    const bodyText = await response.text();
    if (response.status !== 200) {
      throw new GenerativeApiError(response.status, extractApiErrorMessage(response.status, bodyText));
    }

    try {
      return extractCandidateText(JSON.parse(bodyText));
    } catch {
      return "";
    }
  }
}

export function createCompletionClient(config: CompletionClientConfig): CompletionClient {
  if (config.apiKey.trim().length === 0) {
    return new DisabledCompletionClient();
  }

  return new HttpCompletionClient(config);
}
