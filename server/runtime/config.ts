import path from "node:path";

import { DEFAULT_GENERATIVE_API_URL } from "../providers/generativeClient.js";
import type { PersistenceMode } from "../storage/contracts.js";

export interface RuntimeConfig {
  port: number;
  production: boolean;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  generativeApiKey: string;
  generativeApiUrl: string;
  jwtSecret: string;
  jwtExpiryMinutes: number;
  persistenceMode: PersistenceMode;
  dataDir: string;
  upstreamMaxAttempts: number;
  upstreamBaseDelayMs: number;
  upstreamTimeoutMs: number;
  upstreamTimeoutStepMs: number;
  maxUploadBytes: number;
}

const defaultPort = 8001;
const defaultJwtExpiryMinutes = 1_440;
const defaultMaxUploadBytes = 10 * 1024 * 1024;
const developmentJwtSecret = "dev-only-jwt-secret-change-me";

export function resolvePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function resolveCorsOrigins(raw: string | undefined): {
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const allowedCorsOrigins = configured.length > 0 ? configured : ["*"];

  return {
    allowedCorsOrigins,
    allowAnyCorsOrigin: allowedCorsOrigins.includes("*")
  };
}

export function resolvePersistenceMode(raw: string | undefined): PersistenceMode {
  return raw?.trim().toLowerCase() === "file" ? "file" : "disabled";
}

export function normalizeOptionalUrl(raw: string | undefined): string {
  const trimmed = raw?.trim() ?? "";
  if (trimmed.length === 0) {
    return "";
  }

  try {
    return new URL(trimmed).toString();
  } catch {
    return "";
  }
}

export function resolveRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeConfig {
  const production = env.NODE_ENV?.trim().toLowerCase() === "production";
  const { allowedCorsOrigins, allowAnyCorsOrigin } = resolveCorsOrigins(env.CORS_ORIGINS);
  const jwtSecret = (env.JWT_SECRET ?? "").trim();

  if (production && jwtSecret.length === 0) {
    throw new Error("JWT_SECRET is required when NODE_ENV=production.");
  }

  const config: RuntimeConfig = {
    port: resolvePort(env.PORT),
    production,
    allowedCorsOrigins,
    allowAnyCorsOrigin,
    generativeApiKey: (env.GEMINI_API_KEY ?? "").trim(),
    generativeApiUrl: normalizeOptionalUrl(env.GEMINI_API_URL) || DEFAULT_GENERATIVE_API_URL,
    jwtSecret: jwtSecret || developmentJwtSecret,
    jwtExpiryMinutes: parseIntEnv(env.JWT_EXPIRY_MINUTES, defaultJwtExpiryMinutes, 1, 525_600),
    persistenceMode: resolvePersistenceMode(env.PERSISTENCE_MODE),
    dataDir: path.resolve(cwd, (env.DATA_DIR ?? "").trim() || "data"),
    upstreamMaxAttempts: parseIntEnv(env.UPSTREAM_MAX_ATTEMPTS, 3, 1, 10),
    upstreamBaseDelayMs: parseIntEnv(env.UPSTREAM_BASE_DELAY_MS, 2_000, 0, 60_000),
    upstreamTimeoutMs: parseIntEnv(env.UPSTREAM_TIMEOUT_MS, 30_000, 1_000, 600_000),
    upstreamTimeoutStepMs: parseIntEnv(env.UPSTREAM_TIMEOUT_STEP_MS, 15_000, 0, 600_000),
    maxUploadBytes: parseIntEnv(env.MAX_UPLOAD_BYTES, defaultMaxUploadBytes, 1_024, 100 * 1024 * 1024)
  };

  return Object.freeze(config);
}
