import path from "node:path";
import type { Server } from "node:http";

import { createDocumentAnalyzer } from "../analysis/analyzer.js";
import { createCredentialService } from "../auth/credentials.js";
import { createApp } from "../http/appFactory.js";
import { createCompletionClient, type CompletionClient } from "../providers/generativeClient.js";
import { createRetryPolicy } from "../providers/retryPolicy.js";
import type { RecordStore } from "../storage/contracts.js";
import { LocalRecordStore, RECORD_DB_FILENAME } from "../storage/localRecordStore.js";
import { createUnavailableRecordStore } from "../storage/unavailableStore.js";
import { createWorkflowGenerator } from "../workflow/generator.js";
import { resolveRuntimeConfig, type RuntimeConfig } from "./config.js";

export interface ServerRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<RuntimeConfig>;
  store?: RecordStore;
  completionClient?: CompletionClient;
}

export interface ServerRuntime {
  app: ReturnType<typeof createApp>;
  config: RuntimeConfig;
  store: RecordStore;
  start: () => Server;
  stop: () => void;
}

export function createRecordStore(config: Pick<RuntimeConfig, "persistenceMode" | "dataDir">): RecordStore {
  if (config.persistenceMode === "file") {
    return new LocalRecordStore(path.join(config.dataDir, RECORD_DB_FILENAME));
  }
  return createUnavailableRecordStore();
}

export function createServerRuntime(options: ServerRuntimeOptions = {}): ServerRuntime {
  const resolvedConfig = resolveRuntimeConfig(options.env);
  const config: RuntimeConfig = Object.freeze({
    ...resolvedConfig,
    ...(options.config ?? {})
  });
  const appVersion =
    (options.env?.npm_package_version ?? process.env.npm_package_version ?? "dev").trim() || "dev";

  const store = options.store ?? createRecordStore(config);
  const completionClient =
    options.completionClient ??
    createCompletionClient({
      apiKey: config.generativeApiKey,
      apiUrl: config.generativeApiUrl
    });
  const policy = createRetryPolicy({
    maxAttempts: config.upstreamMaxAttempts,
    baseDelayMs: config.upstreamBaseDelayMs,
    attemptTimeoutMs: config.upstreamTimeoutMs,
    attemptTimeoutStepMs: config.upstreamTimeoutStepMs
  });
  const credentials = createCredentialService({
    jwtSecret: config.jwtSecret,
    tokenExpiryMinutes: config.jwtExpiryMinutes
  });

  const app = createApp({
    allowedCorsOrigins: config.allowedCorsOrigins,
    allowAnyCorsOrigin: config.allowAnyCorsOrigin,
    maxUploadBytes: config.maxUploadBytes,
    verifyToken: (token) => credentials.verifyToken(token),
    system: {
      getVersion: () => appVersion,
      isAiConfigured: () => completionClient.isConfigured(),
      getPersistenceStatus: () => store.describe()
    },
    auth: {
      store,
      credentials
    },
    analyses: {
      analyzer: createDocumentAnalyzer({ client: completionClient, policy }),
      store
    },
    workflows: {
      generator: createWorkflowGenerator({ client: completionClient, policy }),
      store
    }
  });

  let server: Server | null = null;

  function stop(): void {
    if (server) {
      server.close();
      server = null;
    }
  }

  function start(): Server {
    if (server) {
      return server;
    }

    server = app.listen(config.port, () => {
      console.log(`Requirements analysis API listening on http://localhost:${config.port}`);
      if (!completionClient.isConfigured()) {
        console.warn("[ai-warning] GEMINI_API_KEY is not set; analysis and workflow requests will fail with 503.");
      }
      const persistence = store.describe();
      if (!persistence.available) {
        console.warn(`[persistence-warning] ${persistence.detail}`);
      }
      if (!config.production && (options.env ?? process.env).JWT_SECRET === undefined) {
        console.warn("[auth-warning] JWT_SECRET is not set; using a development-only signing secret.");
      }
    });

    return server;
  }

  return {
    app,
    config,
    store,
    start,
    stop
  };
}
