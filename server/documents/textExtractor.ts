import path from "node:path";
import mammoth from "mammoth";

import { UnreadableDocumentError, UnsupportedFileTypeError, toErrorMessage } from "../errors.js";

export const SUPPORTED_DOCUMENT_TYPES = ["PDF", "DOCX", "TXT", "MD"] as const;

export type DocumentFormat = "pdf" | "docx" | "text";

export function resolveDocumentFormat(filename: string): DocumentFormat {
  const extension = path.extname(filename).toLowerCase();
  if (extension === ".pdf") return "pdf";
  if (extension === ".docx") return "docx";
  if (extension === ".txt" || extension === ".md") return "text";
  throw new UnsupportedFileTypeError();
}

async function extractPdfText(bytes: Buffer): Promise<string> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data: new Uint8Array(bytes) });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

async function extractDocxText(bytes: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  return result.value;
}

function decodeUtf8(bytes: Buffer): string {
  return bytes.toString("utf8").replace(/^\uFEFF/, "");
}

/**
 * Reads the text of an uploaded requirements document. The format is chosen from the
 * file extension before any bytes are inspected.
 */
export async function extractDocumentText(filename: string, bytes: Buffer): Promise<string> {
  const format = resolveDocumentFormat(filename);

  let text: string;
  try {
    if (format === "pdf") {
      text = await extractPdfText(bytes);
    } else if (format === "docx") {
      text = await extractDocxText(bytes);
    } else {
      text = decodeUtf8(bytes);
    }
  } catch (error) {
    console.warn("[document-extract]", `${filename}: ${toErrorMessage(error)}`);
    throw new UnreadableDocumentError(`Could not read ${format.toUpperCase()} file: ${toErrorMessage(error)}`);
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new UnreadableDocumentError();
  }

  return trimmed;
}
