import { buildWorkflowPrompt, WORKFLOW_GENERATION_SETTINGS } from "../prompts/workflow.js";
import type { CompletionClient } from "../providers/generativeClient.js";
import { requestCompletion, type RetryPolicy } from "../providers/retryPolicy.js";
import type { WorkflowGenerationResult, WorkflowKind } from "../types/contracts.js";
import { getFallbackGraph, selectFallbackGraphId } from "./fallback.js";
import { hasEntryAndExit, inspectGraph } from "./graphInspection.js";
import { normalizeWorkflowNodes } from "./normalizers.js";

export interface WorkflowGeneratorDependencies {
  client: CompletionClient;
  policy: RetryPolicy;
  log?: (message: string) => void;
}

export interface WorkflowGenerateOptions {
  signal?: AbortSignal;
}

export interface WorkflowGenerator {
  generate(
    documentText: string,
    workflowKind: WorkflowKind,
    options?: WorkflowGenerateOptions
  ): Promise<WorkflowGenerationResult>;
}

export function createWorkflowGenerator(deps: WorkflowGeneratorDependencies): WorkflowGenerator {
  const log = deps.log ?? ((message: string) => console.info(`[workflow-fallback] ${message}`));

  function fallback(
    documentText: string,
    workflowKind: WorkflowKind,
    reason: string,
    notes: string[]
  ): WorkflowGenerationResult {
    const graphId = selectFallbackGraphId(documentText, workflowKind);
    log(`${workflowKind}: ${reason} Using reference graph "${graphId}".`);
    return {
      nodes: getFallbackGraph(graphId),
      source: "fallback",
      notes: [...notes, reason, `Reference graph "${graphId}" was used instead of model output.`]
    };
  }

  return {
    async generate(documentText, workflowKind, options = {}) {
      const rawOutput = await requestCompletion(
        deps.client,
        {
          prompt: buildWorkflowPrompt(documentText, workflowKind),
          settings: WORKFLOW_GENERATION_SETTINGS
        },
        deps.policy,
        {
          signal: options.signal,
          label: `workflow:${workflowKind}`
        }
      );

      if (rawOutput.trim().length === 0) {
        return fallback(documentText, workflowKind, "Model returned no content.", []);
      }

      const normalized = normalizeWorkflowNodes(rawOutput);
      if (!normalized.ok) {
        return fallback(documentText, workflowKind, normalized.reason, normalized.notes);
      }

      if (!hasEntryAndExit(normalized.nodes)) {
        return fallback(documentText, workflowKind, "Model graph lacked a start or end node.", normalized.notes);
      }

      const issues = inspectGraph(normalized.nodes);
      return {
        nodes: normalized.nodes,
        source: "model",
        notes: [
          ...(normalized.parse === "fragment" ? ["Node list was recovered from surrounding text."] : []),
          ...normalized.notes,
          ...issues.map((issue) => issue.message)
        ]
      };
    }
  };
}
