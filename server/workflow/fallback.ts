import { z } from "zod";

import type { GraphNode, WorkflowKind } from "../types/contracts.js";
import { WORKFLOW_KINDS } from "../types/contracts.js";
import rawCatalog from "./fallbackGraphs.json" with { type: "json" };
import { graphNodeSchema } from "./schemas.js";

const keywordRuleSchema = z.object({
  graph: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1)
});

const workflowKindSchema = z.enum(WORKFLOW_KINDS);

const fallbackCatalogSchema = z
  .object({
    rules: z.record(workflowKindSchema, z.array(keywordRuleSchema)),
    defaults: z.record(workflowKindSchema, z.string().min(1)),
    fallbackGraph: z.string().min(1),
    graphs: z.record(z.array(graphNodeSchema).min(1))
  })
  .superRefine((catalog, context) => {
    const referenced = [
      catalog.fallbackGraph,
      ...Object.values(catalog.defaults),
      ...Object.values(catalog.rules).flatMap((rules) => (rules ?? []).map((rule) => rule.graph))
    ];
    for (const graphId of referenced) {
      if (typeof graphId !== "string" || !catalog.graphs[graphId]) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Fallback catalog references unknown graph "${graphId}".`
        });
      }
    }
  });

export type FallbackCatalog = z.infer<typeof fallbackCatalogSchema>;

export const FALLBACK_CATALOG: FallbackCatalog = fallbackCatalogSchema.parse(rawCatalog);

export function isWorkflowKind(value: string): value is WorkflowKind {
  return WORKFLOW_KINDS.some((kind) => kind === value);
}

export function selectFallbackGraphId(documentText: string, workflowKind: string): string {
  if (!isWorkflowKind(workflowKind)) {
    return FALLBACK_CATALOG.fallbackGraph;
  }

  const haystack = documentText.toLowerCase();
  for (const rule of FALLBACK_CATALOG.rules[workflowKind] ?? []) {
    if (rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()))) {
      return rule.graph;
    }
  }

  return FALLBACK_CATALOG.defaults[workflowKind] ?? FALLBACK_CATALOG.fallbackGraph;
}

function cloneNode(node: GraphNode): GraphNode {
  return {
    id: node.id,
    kind: node.kind,
    label: node.label,
    position: { x: node.position.x, y: node.position.y },
    connections: [...node.connections]
  };
}

export function getFallbackGraph(graphId: string): GraphNode[] {
  const nodes = FALLBACK_CATALOG.graphs[graphId] ?? FALLBACK_CATALOG.graphs[FALLBACK_CATALOG.fallbackGraph] ?? [];
  return nodes.map(cloneNode);
}

/**
 * Picks a reference graph for the document by keyword and returns a fresh copy of it.
 * Unrecognized workflow kinds get the kind-agnostic default graph.
 */
export function synthesizeFallbackWorkflow(documentText: string, workflowKind: string): GraphNode[] {
  return getFallbackGraph(selectFallbackGraphId(documentText, workflowKind));
}
