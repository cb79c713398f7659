import express from "express";

import type { TokenClaims } from "../auth/credentials.js";
import {
  createCorsMiddleware,
  createErrorMiddleware,
  createIdentityMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "./middleware.js";
import { registerAnalysisRoutes, type AnalysisRouteDependencies } from "./routes/analyses.js";
import { registerAuthRoutes, type AuthRouteDependencies } from "./routes/auth.js";
import { registerSystemRoutes, type SystemRouteDependencies } from "./routes/system.js";
import { createSingleFileUpload } from "./routes/uploads.js";
import { registerWorkflowRoutes, type WorkflowRouteDependencies } from "./routes/workflows.js";

export interface AppFactoryDependencies {
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  maxUploadBytes: number;
  verifyToken: (token: string) => TokenClaims;
  system: SystemRouteDependencies;
  auth: AuthRouteDependencies;
  analyses: Omit<AnalysisRouteDependencies, "uploadSingleFile">;
  workflows: Omit<WorkflowRouteDependencies, "uploadSingleFile">;
}

export function createApp(deps: AppFactoryDependencies): express.Express {
  const app = express();
  const uploadSingleFile = createSingleFileUpload(deps.maxUploadBytes);

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.allowedCorsOrigins,
      allowAnyOrigin: deps.allowAnyCorsOrigin
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(createIdentityMiddleware({ verifyToken: deps.verifyToken }));

  registerSystemRoutes(app, deps.system);
  registerAuthRoutes(app, deps.auth);
  registerAnalysisRoutes(app, { ...deps.analyses, uploadSingleFile });
  registerWorkflowRoutes(app, { ...deps.workflows, uploadSingleFile });

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
