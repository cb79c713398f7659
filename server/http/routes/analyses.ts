import type { Express, RequestHandler, Response } from "express";
import { nanoid } from "nanoid";

import type { DocumentAnalyzer } from "../../analysis/analyzer.js";
import { extractDocumentText } from "../../documents/textExtractor.js";
import { NotFoundError } from "../../errors.js";
import type { RecordStore } from "../../storage/contracts.js";
import type { AnalysisKind, AnalysisRecord } from "../../types/contracts.js";
import {
  createRequestAbortSignal,
  firstParam,
  persistBestEffort,
  resolveRequestUserId,
  sendRouteError
} from "./helpers.js";
import { analyzeDocumentFileFieldsSchema, analyzeDocumentSchema } from "./schemas.js";
import { readUploadedDocument } from "./uploads.js";

export interface AnalysisRouteDependencies {
  analyzer: DocumentAnalyzer;
  store: RecordStore;
  uploadSingleFile: RequestHandler;
}

export function serializeAnalysisRecord(record: AnalysisRecord) {
  return {
    id: record.id,
    analysis_result: record.analysisResult,
    document_length: record.documentLength,
    analysis_type: record.analysisType,
    ...(record.filename ? { filename: record.filename } : {}),
    timestamp: record.timestamp,
    user_id: record.userId
  };
}

async function runAnalysis(
  deps: AnalysisRouteDependencies,
  response: Response,
  input: { documentText: string; analysisKind: AnalysisKind; filename: string | null }
): Promise<void> {
  const outcome = await deps.analyzer.analyze(input.documentText, input.analysisKind, {
    signal: createRequestAbortSignal(response)
  });

  const record: AnalysisRecord = {
    id: nanoid(),
    documentContent: input.documentText,
    analysisResult: outcome.result,
    analysisType: input.analysisKind,
    documentLength: input.documentText.length,
    filename: input.filename,
    timestamp: new Date().toISOString(),
    userId: resolveRequestUserId(response)
  };
  const persisted = await persistBestEffort("analysis", () => deps.store.analyses.save(record));

  response.json({
    ...serializeAnalysisRecord(record),
    notes: outcome.notes,
    persisted
  });
}

export function registerAnalysisRoutes(app: Express, deps: AnalysisRouteDependencies): void {
  app.post("/api/analyze-document", async (request, response) => {
    try {
      const input = analyzeDocumentSchema.parse(request.body ?? {});
      await runAnalysis(deps, response, {
        documentText: input.document_content,
        analysisKind: input.analysis_type,
        filename: null
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/analyze-document-file", deps.uploadSingleFile, async (request, response) => {
    try {
      const fields = analyzeDocumentFileFieldsSchema.parse(request.body ?? {});
      const upload = readUploadedDocument(request);
      const documentText = await extractDocumentText(upload.filename, upload.bytes);
      await runAnalysis(deps, response, {
        documentText,
        analysisKind: fields.analysis_type,
        filename: upload.filename
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/analyses", async (_request, response) => {
    try {
      const records = await deps.store.analyses.list(resolveRequestUserId(response));
      response.json({ analyses: records.map(serializeAnalysisRecord) });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/analyses/:analysisId", async (request, response) => {
    try {
      const record = await deps.store.analyses.get(
        firstParam(request.params.analysisId),
        resolveRequestUserId(response)
      );
      if (!record) {
        throw new NotFoundError("Analysis");
      }
      response.json(serializeAnalysisRecord(record));
    } catch (error) {
      sendRouteError(error, response);
    }
  });
}
