import { EmptyCompletionError } from "../errors.js";
import { isJsonValue, isRecord } from "../parsing/guards.js";
import { parsePayload } from "../parsing/jsonCandidates.js";
import { ANALYSIS_GENERATION_SETTINGS, ANALYSIS_RESULT_KEYS, buildAnalysisPrompt } from "../prompts/analysis.js";
import type { CompletionClient } from "../providers/generativeClient.js";
import { requestCompletion, type RetryPolicy } from "../providers/retryPolicy.js";
import type { AnalysisKind, AnalysisOutcome, AnalysisResult } from "../types/contracts.js";

export const RAW_ANALYSIS_KEY = "raw_analysis";

export interface DocumentAnalyzerDependencies {
  client: CompletionClient;
  policy: RetryPolicy;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface DocumentAnalyzer {
  analyze(documentText: string, analysisKind: AnalysisKind, options?: AnalyzeOptions): Promise<AnalysisOutcome>;
}

function toAnalysisResult(value: Record<string, unknown>): AnalysisResult | null {
  const result: AnalysisResult = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isJsonValue(entry)) {
      return null;
    }
    result[key] = entry;
  }
  return result;
}

export function interpretAnalysisOutput(rawOutput: string, analysisKind: AnalysisKind): AnalysisOutcome {
  const parsed = parsePayload(rawOutput, "object");
  const structured = parsed.kind === "opaque" || !isRecord(parsed.value) ? null : toAnalysisResult(parsed.value);

  if (!structured) {
    return {
      result: { [RAW_ANALYSIS_KEY]: rawOutput },
      parse: "raw",
      notes: ["Model output was not a JSON object; returned as raw text."]
    };
  }

  const missing = ANALYSIS_RESULT_KEYS[analysisKind].filter((key) => !(key in structured));
  return {
    result: structured,
    parse: "structured",
    notes: missing.length > 0 ? [`Missing expected field(s): ${missing.join(", ")}.`] : []
  };
}

export function createDocumentAnalyzer(deps: DocumentAnalyzerDependencies): DocumentAnalyzer {
  return {
    async analyze(documentText, analysisKind, options = {}) {
      const rawOutput = await requestCompletion(
        deps.client,
        {
          prompt: buildAnalysisPrompt(documentText, analysisKind),
          settings: ANALYSIS_GENERATION_SETTINGS
        },
        deps.policy,
        {
          signal: options.signal,
          label: `analysis:${analysisKind}`
        }
      );

      if (rawOutput.trim().length === 0) {
        throw new EmptyCompletionError();
      }

      return interpretAnalysisOutput(rawOutput, analysisKind);
    }
  };
}
