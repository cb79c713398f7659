import type { Express, RequestHandler, Response } from "express";
import { nanoid } from "nanoid";

import { extractDocumentText } from "../../documents/textExtractor.js";
import { NotFoundError } from "../../errors.js";
import type { RecordStore } from "../../storage/contracts.js";
import type { WorkflowKind, WorkflowRecord } from "../../types/contracts.js";
import type { WorkflowGenerator } from "../../workflow/generator.js";
import {
  createRequestAbortSignal,
  firstParam,
  persistBestEffort,
  resolveRequestUserId,
  sendRouteError
} from "./helpers.js";
import { generateWorkflowFileFieldsSchema, generateWorkflowSchema } from "./schemas.js";
import { readUploadedDocument } from "./uploads.js";

export interface WorkflowRouteDependencies {
  generator: WorkflowGenerator;
  store: RecordStore;
  uploadSingleFile: RequestHandler;
}

export function serializeWorkflowRecord(record: WorkflowRecord) {
  return {
    id: record.id,
    workflow_nodes: record.workflowNodes,
    workflow_type: record.workflowType,
    document_length: record.documentLength,
    source: record.source,
    ...(record.filename ? { filename: record.filename } : {}),
    timestamp: record.timestamp,
    user_id: record.userId
  };
}

async function runWorkflowGeneration(
  deps: WorkflowRouteDependencies,
  response: Response,
  input: { documentText: string; workflowKind: WorkflowKind; filename: string | null }
): Promise<void> {
  const generated = await deps.generator.generate(input.documentText, input.workflowKind, {
    signal: createRequestAbortSignal(response)
  });

  const record: WorkflowRecord = {
    id: nanoid(),
    documentContent: input.documentText,
    workflowNodes: generated.nodes,
    workflowType: input.workflowKind,
    documentLength: input.documentText.length,
    source: generated.source,
    filename: input.filename,
    timestamp: new Date().toISOString(),
    userId: resolveRequestUserId(response)
  };
  const persisted = await persistBestEffort("workflow", () => deps.store.workflows.save(record));

  response.json({
    ...serializeWorkflowRecord(record),
    notes: generated.notes,
    persisted
  });
}

export function registerWorkflowRoutes(app: Express, deps: WorkflowRouteDependencies): void {
  app.post("/api/generate-workflow", async (request, response) => {
    try {
      const input = generateWorkflowSchema.parse(request.body ?? {});
      await runWorkflowGeneration(deps, response, {
        documentText: input.document_content,
        workflowKind: input.workflow_type,
        filename: null
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/generate-workflow-file", deps.uploadSingleFile, async (request, response) => {
    try {
      const fields = generateWorkflowFileFieldsSchema.parse(request.body ?? {});
      const upload = readUploadedDocument(request);
      const documentText = await extractDocumentText(upload.filename, upload.bytes);
      await runWorkflowGeneration(deps, response, {
        documentText,
        workflowKind: fields.workflow_type,
        filename: upload.filename
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/workflows", async (_request, response) => {
    try {
      const records = await deps.store.workflows.list(resolveRequestUserId(response));
      response.json({ workflows: records.map(serializeWorkflowRecord) });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/workflows/:workflowId", async (request, response) => {
    try {
      const record = await deps.store.workflows.get(
        firstParam(request.params.workflowId),
        resolveRequestUserId(response)
      );
      if (!record) {
        throw new NotFoundError("Workflow");
      }
      response.json(serializeWorkflowRecord(record));
    } catch (error) {
      sendRouteError(error, response);
    }
  });
}
