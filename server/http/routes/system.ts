import type { Express } from "express";

import { SUPPORTED_DOCUMENT_TYPES } from "../../documents/textExtractor.js";
import type { PersistenceStatus } from "../../storage/contracts.js";
import { ANALYSIS_KINDS, WORKFLOW_KINDS } from "../../types/contracts.js";

export interface SystemRouteDependencies {
  getVersion?: () => string;
  isAiConfigured: () => boolean;
  getPersistenceStatus: () => PersistenceStatus;
}

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/api/", (_request, response) => {
    response.json({ message: "Requirements analysis API" });
  });

  app.get("/api/health", (_request, response) => {
    const version = deps.getVersion?.();
    const persistence = deps.getPersistenceStatus();
    response.json({
      ok: true,
      status: "healthy",
      now: new Date().toISOString(),
      ...(typeof version === "string" && version.trim().length > 0
        ? {
            version: version.trim()
          }
        : {}),
      ai: {
        configured: deps.isAiConfigured()
      },
      persistence,
      features: {
        authentication: persistence.available,
        documentParsing: [...SUPPORTED_DOCUMENT_TYPES],
        analysisTypes: [...ANALYSIS_KINDS],
        workflowTypes: [...WORKFLOW_KINDS]
      }
    });
  });
}
