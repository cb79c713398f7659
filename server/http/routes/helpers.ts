import type { Response } from "express";
import { ZodError } from "zod";

import { createAbortError, isAbortError } from "../../abort.js";
import { ServiceError, StorageUnavailableError, UnauthorizedError, UpstreamRejectedError } from "../../errors.js";

export function sendServiceError(error: ServiceError, response: Response): void {
  response.status(error.statusCode).json({
    error: error.message,
    code: error.code,
    ...(error instanceof UpstreamRejectedError ? { upstreamStatus: error.upstreamStatus } : {})
  });
}

export function sendRouteError(error: unknown, response: Response): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  if (error instanceof ServiceError) {
    sendServiceError(error, response);
    return;
  }

  if (isAbortError(error)) {
    console.info("[api-abort] client disconnected before the response was ready");
    response.status(499).json({ error: "Client closed request" });
    return;
  }

  console.error("[api-error]", error);
  const message =
    error instanceof Error && error.message.trim().length > 0
      ? error.message.trim().replace(/\s+/g, " ").slice(0, 480)
      : "Internal server error";
  response.status(500).json({ error: message });
}

export function firstParam(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

export function resolveRequestUserId(response: Response): string | null {
  const userId: unknown = response.locals.userId;
  return typeof userId === "string" && userId.length > 0 ? userId : null;
}

export function requireRequestUserId(response: Response): string {
  const userId = resolveRequestUserId(response);
  if (!userId) {
    throw new UnauthorizedError();
  }
  return userId;
}

/** Aborts when the client goes away before the response has been written. */
export function createRequestAbortSignal(response: Response): AbortSignal {
  const controller = new AbortController();
  response.on("close", () => {
    if (!response.writableFinished) {
      controller.abort(createAbortError("Client disconnected."));
    }
  });
  return controller.signal;
}

/**
 * Saves a record without failing the request. Returns whether the record was stored.
 */
export async function persistBestEffort(label: string, save: () => Promise<unknown>): Promise<boolean> {
  try {
    await save();
    return true;
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      console.warn("[persistence-skip]", `${label}: ${error.message}`);
    } else {
      console.error("[persistence-error]", label, error);
    }
    return false;
  }
}
