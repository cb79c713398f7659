import type { GraphNode, NodeKind } from "../types/contracts.js";

export type GraphIssueCode = "missing_start" | "missing_end" | "dangling_connection" | "thin_decision";

export interface GraphIssue {
  code: GraphIssueCode;
  message: string;
  nodeId?: string;
}

export function countNodeKinds(nodes: GraphNode[]): Record<NodeKind, number> {
  const counts: Record<NodeKind, number> = { start: 0, process: 0, decision: 0, end: 0 };
  for (const node of nodes) {
    counts[node.kind] += 1;
  }
  return counts;
}

export function hasEntryAndExit(nodes: GraphNode[]): boolean {
  const counts = countNodeKinds(nodes);
  return counts.start > 0 && counts.end > 0;
}

// Reports only. Layout and connection quirks from the model are surfaced as notes.
export function inspectGraph(nodes: GraphNode[]): GraphIssue[] {
  const issues: GraphIssue[] = [];
  const counts = countNodeKinds(nodes);
  const ids = new Set(nodes.map((node) => node.id));

  if (counts.start === 0) {
    issues.push({ code: "missing_start", message: "Graph has no start node." });
  }
  if (counts.end === 0) {
    issues.push({ code: "missing_end", message: "Graph has no end node." });
  }

  for (const node of nodes) {
    for (const target of node.connections) {
      if (!ids.has(target)) {
        issues.push({
          code: "dangling_connection",
          message: `Node "${node.id}" connects to unknown node "${target}".`,
          nodeId: node.id
        });
      }
    }

    if (node.kind === "decision" && new Set(node.connections).size < 2) {
      issues.push({
        code: "thin_decision",
        message: `Decision node "${node.id}" has fewer than two outgoing branches.`,
        nodeId: node.id
      });
    }
  }

  return issues;
}
