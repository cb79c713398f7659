import type { GenerationSettings } from "../providers/generativeClient.js";
import type { WorkflowKind } from "../types/contracts.js";

export const WORKFLOW_GENERATION_SETTINGS: GenerationSettings = Object.freeze({
  temperature: 0.1,
  topK: 20,
  topP: 0.8,
  maxOutputTokens: 2048
});

const nodeArrayContract = [
  "Return a JSON array of workflow nodes and nothing else:",
  "[",
  "  {",
  '    "id": "unique_id",',
  '    "type": "start|process|decision|end",',
  '    "label": "Step wording taken from the document",',
  '    "x": 200,',
  '    "y": 100,',
  '    "connections": [{ "target": "next_node_id", "label": "Yes|No|Continue" }]',
  "  }",
  "]",
  "",
  "Layout rules:",
  "- Use exactly one start node and exactly one end node.",
  "- Use process for actions and decision for branches; every decision needs at least two labelled connections.",
  "- Place the first node at x 200 and step x by 300 for each following node (500, 800, 1100, ...).",
  "- Use y 100 for the main flow, y 300 for No or error branches and y 50 for Yes detours."
];

const workflowBriefs: Record<WorkflowKind, string[]> = {
  user_journey: [
    "You are a product analyst. Read the requirements document and extract the user journey it describes.",
    "",
    "Look for:",
    "- user stories and the flows users actually follow",
    "- the points where a user makes a choice",
    "- the features users touch and the roles involved",
    "",
    "Keep the document's own terminology in every label."
  ],
  service_blueprint: [
    "You are a business process analyst. Read the requirements document and map the service delivery process it describes.",
    "",
    "Look for:",
    "- backend processes and system interactions",
    "- validation and approval steps",
    "- error handling and quality checks",
    "",
    "Use decision nodes for validation, approval and error handling."
  ],
  feature_flow: [
    "You are a technical architect. Read the requirements document and extract the feature interactions and technical flow it describes.",
    "",
    "Look for:",
    "- features and how they connect",
    "- technical integrations and feature dependencies",
    "- conditional logic, validation and error handling",
    "",
    "Use decision nodes for feature validation and conditional logic."
  ]
};

export function buildWorkflowPrompt(documentText: string, workflowKind: WorkflowKind): string {
  return [
    ...workflowBriefs[workflowKind],
    "",
    ...nodeArrayContract,
    "",
    "Document to analyze:",
    "",
    documentText
  ].join("\n");
}
