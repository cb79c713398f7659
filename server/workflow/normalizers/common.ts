import { firstNonEmptyString, isRecord } from "../../parsing/guards.js";
import type { NodeKind } from "../../types/contracts.js";

export const LAYOUT_ORIGIN_X = 200;
export const LAYOUT_STEP_X = 300;
export const LAYOUT_MAIN_Y = 100;

export function defaultPosition(index: number): { x: number; y: number } {
  return {
    x: LAYOUT_ORIGIN_X + index * LAYOUT_STEP_X,
    y: LAYOUT_MAIN_Y
  };
}

export function normalizeKind(value: unknown): NodeKind | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, "_");

  if (normalized === "start") return "start";
  if (normalized === "process") return "process";
  if (normalized === "decision") return "decision";
  if (normalized === "end") return "end";
  if (normalized === "begin" || normalized === "entry" || normalized === "trigger" || normalized === "start_event") {
    return "start";
  }
  if (
    normalized === "step" ||
    normalized === "task" ||
    normalized === "action" ||
    normalized === "activity" ||
    normalized === "operation"
  ) {
    return "process";
  }
  if (
    normalized === "condition" ||
    normalized === "branch" ||
    normalized === "gateway" ||
    normalized === "choice" ||
    normalized === "conditional"
  ) {
    return "decision";
  }
  if (
    normalized === "finish" ||
    normalized === "stop" ||
    normalized === "terminal" ||
    normalized === "exit" ||
    normalized === "end_event"
  ) {
    return "end";
  }
  return undefined;
}

export function normalizeNodeId(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return firstNonEmptyString(value);
}

export function readCoordinate(raw: Record<string, unknown>, axis: "x" | "y"): number | undefined {
  const nested = isRecord(raw.position) ? raw.position[axis] : undefined;
  for (const candidate of [raw[axis], nested]) {
    if (typeof candidate === "number" && Number.isFinite(candidate)) {
      return Math.round(candidate);
    }
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      const parsed = Number(candidate);
      if (Number.isFinite(parsed)) {
        return Math.round(parsed);
      }
    }
  }
  return undefined;
}

export function normalizeConnections(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const targets: string[] = [];
  for (const entry of value) {
    const target = isRecord(entry) ? normalizeNodeId(entry.target ?? entry.to ?? entry.id) : normalizeNodeId(entry);
    if (target) {
      targets.push(target);
    }
  }
  return targets;
}

export function claimUniqueId(candidate: string, seenIds: Set<string>): string {
  if (!seenIds.has(candidate)) {
    seenIds.add(candidate);
    return candidate;
  }

  let suffix = 2;
  while (seenIds.has(`${candidate}_${suffix}`)) {
    suffix += 1;
  }

  const unique = `${candidate}_${suffix}`;
  seenIds.add(unique);
  return unique;
}
