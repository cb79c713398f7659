import type { GenerationSettings } from "../providers/generativeClient.js";
import type { AnalysisKind } from "../types/contracts.js";

export const ANALYSIS_GENERATION_SETTINGS: GenerationSettings = Object.freeze({
  temperature: 0.3,
  topK: 40,
  topP: 0.95,
  maxOutputTokens: 2048
});

export const ANALYSIS_RESULT_KEYS: Record<AnalysisKind, readonly string[]> = {
  gap_analysis: [
    "business_gaps",
    "design_ambiguities",
    "missing_requirements",
    "edge_cases",
    "recommendations",
    "overall_assessment"
  ],
  requirements_extraction: [
    "functional_requirements",
    "non_functional_requirements",
    "business_requirements",
    "user_stories",
    "acceptance_criteria",
    "constraints",
    "assumptions"
  ],
  summary: [
    "executive_summary",
    "key_features",
    "target_audience",
    "business_goals",
    "success_metrics",
    "timeline",
    "stakeholders",
    "risks"
  ]
};

const stringFields = new Set(["overall_assessment", "executive_summary", "target_audience", "timeline"]);

const analysisBriefs: Record<AnalysisKind, string[]> = {
  gap_analysis: [
    "You are a senior business analyst and product manager. Review the requirements document and identify:",
    "1. Business gaps: business goals the product requirements do not address.",
    "2. Design ambiguities: vague design statements that need clarification.",
    "3. Missing requirements: functional or non-functional requirements that are absent.",
    "4. Edge cases: boundary conditions and exceptional scenarios that are not covered.",
    "5. Recommendations: specific changes that would improve the document.",
    "Finish with an overall assessment of quality and completeness."
  ],
  requirements_extraction: [
    "You are a senior business analyst. Extract every requirement from the requirements document and sort it into a category."
  ],
  summary: [
    "You are an expert document summarizer. Write a structured summary of the requirements document."
  ]
};

function describeResultShape(analysisKind: AnalysisKind): string[] {
  const keys = ANALYSIS_RESULT_KEYS[analysisKind];
  return [
    "{",
    ...keys.map((key, index) => {
      const placeholder = stringFields.has(key) ? '"text"' : '["item", "..."]';
      return `  "${key}": ${placeholder}${index < keys.length - 1 ? "," : ""}`;
    }),
    "}"
  ];
}

export function buildAnalysisPrompt(documentText: string, analysisKind: AnalysisKind): string {
  return [
    ...analysisBriefs[analysisKind],
    "",
    "Respond with valid JSON only, using this structure:",
    ...describeResultShape(analysisKind),
    "",
    "Document to analyze:",
    "",
    documentText
  ].join("\n");
}
