import { z } from "zod";

import { ANALYSIS_KINDS, WORKFLOW_KINDS } from "../../types/contracts.js";

const documentContentSchema = z
  .string()
  .max(1_000_000)
  .refine((value) => value.trim().length > 0, { message: "Document content must not be empty" });

export const analysisKindSchema = z.enum(ANALYSIS_KINDS);
export const workflowKindSchema = z.enum(WORKFLOW_KINDS);

export const analyzeDocumentSchema = z.object({
  document_content: documentContentSchema,
  analysis_type: analysisKindSchema.default("gap_analysis")
});

export const analyzeDocumentFileFieldsSchema = z.object({
  analysis_type: analysisKindSchema.default("gap_analysis")
});

export const generateWorkflowSchema = z.object({
  document_content: documentContentSchema,
  workflow_type: workflowKindSchema.default("user_journey")
});

export const generateWorkflowFileFieldsSchema = z.object({
  workflow_type: workflowKindSchema.default("user_journey")
});

export const registerUserSchema = z.object({
  email: z.string().trim().email().max(320),
  password: z.string().min(6).max(256),
  name: z.string().trim().min(1).max(200)
});

export const loginSchema = z.object({
  email: z.string().trim().email().max(320),
  password: z.string().min(1).max(256)
});
