export type NodeKind = "start" | "process" | "decision" | "end";
export type WorkflowKind = "user_journey" | "service_blueprint" | "feature_flow";
export type AnalysisKind = "gap_analysis" | "requirements_extraction" | "summary";
export type GraphSource = "model" | "fallback";

export const NODE_KINDS = ["start", "process", "decision", "end"] as const;
export const WORKFLOW_KINDS = ["user_journey", "service_blueprint", "feature_flow"] as const;
export const ANALYSIS_KINDS = ["gap_analysis", "requirements_extraction", "summary"] as const;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface NodePosition {
  x: number;
  y: number;
}

export interface GraphNode {
  id: string;
  kind: NodeKind;
  label: string;
  position: NodePosition;
  connections: string[];
}

export type AnalysisResult = Record<string, JsonValue>;

export interface WorkflowGenerationResult {
  nodes: GraphNode[];
  source: GraphSource;
  notes: string[];
}

export interface AnalysisOutcome {
  result: AnalysisResult;
  parse: "structured" | "raw";
  notes: string[];
}

export interface AnalysisRecord {
  id: string;
  documentContent: string;
  analysisResult: AnalysisResult;
  analysisType: AnalysisKind;
  documentLength: number;
  filename: string | null;
  timestamp: string;
  userId: string | null;
}

export interface WorkflowRecord {
  id: string;
  documentContent: string;
  workflowNodes: GraphNode[];
  workflowType: WorkflowKind;
  documentLength: number;
  source: GraphSource;
  filename: string | null;
  timestamp: string;
  userId: string | null;
}

export interface UserRecord {
  id: string;
  email: string;
  name: string;
  hashedPassword: string;
  createdAt: string;
  isActive: boolean;
}
