import type { Request, RequestHandler } from "express";
import multer from "multer";

import { UnreadableDocumentError } from "../../errors.js";

export interface UploadedDocument {
  filename: string;
  bytes: Buffer;
}

export function createSingleFileUpload(maxUploadBytes: number, fieldName = "file"): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
      files: 1
    }
  }).single(fieldName);
}

export function readUploadedDocument(request: Request): UploadedDocument {
  const file = request.file;
  if (!file) {
    throw new UnreadableDocumentError("No file uploaded. Attach the document in the \"file\" field.");
  }

  return {
    filename: file.originalname,
    bytes: file.buffer
  };
}
