import { isRecord, firstNonEmptyString } from "../parsing/guards.js";
import { parsePayload, type ParsedPayload } from "../parsing/jsonCandidates.js";
import type { GraphNode } from "../types/contracts.js";
import {
  claimUniqueId,
  defaultPosition,
  normalizeConnections,
  normalizeKind,
  normalizeNodeId,
  readCoordinate
} from "./normalizers/common.js";

export const MIN_MODEL_NODE_COUNT = 3;

export type NormalizedWorkflow =
  | { ok: true; nodes: GraphNode[]; notes: string[]; parse: ParsedPayload["kind"] }
  | { ok: false; reason: string; notes: string[]; parse: ParsedPayload["kind"] };

function unwrapNodeList(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) {
    return value;
  }

  if (isRecord(value)) {
    if (Array.isArray(value.workflow)) {
      return value.workflow;
    }
    if (Array.isArray(value.nodes)) {
      return value.nodes;
    }
  }

  return undefined;
}

function normalizeNode(raw: Record<string, unknown>, index: number, seenIds: Set<string>, notes: string[]): GraphNode {
  const requestedId = normalizeNodeId(raw.id) ?? `node_${index}`;
  const id = claimUniqueId(requestedId, seenIds);
  if (id !== requestedId) {
    notes.push(
      `Duplicate node id "${requestedId}" renamed to "${id}"; connections to "${requestedId}" still point at the first node with that id.`
    );
  }

  const rawKind = raw.type ?? raw.kind;
  let kind = normalizeKind(rawKind);
  if (!kind) {
    kind = "process";
    notes.push(
      typeof rawKind === "string" && rawKind.trim().length > 0
        ? `Node "${id}" had unknown type "${rawKind.trim()}"; treated as process.`
        : `Node "${id}" had no type; treated as process.`
    );
  }

  const fallbackPosition = defaultPosition(index);

  return {
    id,
    kind,
    label: firstNonEmptyString(raw.label, raw.name, raw.title, raw.text) ?? `Step ${index + 1}`,
    position: {
      x: readCoordinate(raw, "x") ?? fallbackPosition.x,
      y: readCoordinate(raw, "y") ?? fallbackPosition.y
    },
    connections: normalizeConnections(raw.connections)
  };
}

export function normalizeWorkflowNodes(rawOutput: string): NormalizedWorkflow {
  const parsed = parsePayload(rawOutput, "array");
  if (parsed.kind === "opaque") {
    return { ok: false, reason: "Model output contained no parseable JSON.", notes: [], parse: parsed.kind };
  }

  const entries = unwrapNodeList(parsed.value);
  if (!entries) {
    return { ok: false, reason: "Model output was JSON but not a node list.", notes: [], parse: parsed.kind };
  }

  const notes: string[] = [];
  const seenIds = new Set<string>();
  const nodes: GraphNode[] = [];

  entries.forEach((entry, index) => {
    if (!isRecord(entry)) {
      notes.push(`Skipped non-object entry at position ${index}.`);
      return;
    }
    nodes.push(normalizeNode(entry, index, seenIds, notes));
  });

  if (nodes.length < MIN_MODEL_NODE_COUNT) {
    return {
      ok: false,
      reason: `Model output had ${nodes.length} usable node(s); at least ${MIN_MODEL_NODE_COUNT} are required.`,
      notes,
      parse: parsed.kind
    };
  }

  return { ok: true, nodes, notes, parse: parsed.kind };
}
