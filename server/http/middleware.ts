import cors from "cors";
import type { NextFunction, Request, Response } from "express";
import multer from "multer";

import { extractBearerToken, type TokenClaims } from "../auth/credentials.js";
import { InvalidTokenError, isServiceError } from "../errors.js";
import { sendServiceError } from "./routes/helpers.js";

export function createSecurityHeadersMiddleware(): (request: Request, response: Response, next: NextFunction) => void {
  return (_request, response, next) => {
    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Frame-Options", "DENY");
    response.setHeader("Referrer-Policy", "no-referrer");
    next();
  };
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
}

export function createCorsMiddleware(config: CorsConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowAnyOrigin || config.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: false,
    maxAge: 600
  });
}

export interface IdentityMiddlewareOptions {
  verifyToken: (token: string) => TokenClaims;
  publicPaths?: string[];
}

/**
 * Resolves the caller from an optional bearer token into `response.locals.userId`.
 * Requests without an Authorization header are anonymous; a header that does not carry
 * a valid token is rejected.
 */
export function createIdentityMiddleware(options: IdentityMiddlewareOptions) {
  const publicPaths = new Set(options.publicPaths ?? ["/api/", "/api/health"]);

  return (request: Request, response: Response, next: NextFunction) => {
    response.locals.userId = null;

    const header = typeof request.headers.authorization === "string" ? request.headers.authorization : "";
    if (request.method === "OPTIONS" || publicPaths.has(request.path) || header.trim().length === 0) {
      next();
      return;
    }

    const token = extractBearerToken(header);
    try {
      if (token.length === 0) {
        throw new InvalidTokenError();
      }
      response.locals.userId = options.verifyToken(token).userId;
    } catch (error) {
      if (isServiceError(error)) {
        sendServiceError(error, response);
        return;
      }
      next(error);
      return;
    }

    next();
  };
}

export function createNotFoundMiddleware(): (request: Request, response: Response) => void {
  return (_request, response) => {
    response.status(404).json({ error: "Not found" });
  };
}

function isBodyParseError(error: unknown): error is { type: string; status: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

export function createErrorMiddleware(): (
  error: unknown,
  request: Request,
  response: Response,
  next: NextFunction
) => void {
  return (error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    void _request;
    void _next;

    if (error instanceof multer.MulterError) {
      const statusCode = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      response.status(statusCode).json({ error: error.message, code: error.code });
      return;
    }

    if (isBodyParseError(error)) {
      response.status(400).json({ error: "Request body is not valid JSON." });
      return;
    }

    if (isServiceError(error)) {
      sendServiceError(error, response);
      return;
    }

    console.error("[unhandled-api-error]", error);
    response.status(500).json({ error: "Internal server error" });
  };
}
