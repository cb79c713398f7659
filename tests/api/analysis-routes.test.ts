import { afterEach, describe, expect, it, vi } from "vitest";

import type { DocumentAnalyzer } from "../../server/analysis/analyzer.js";
import { UpstreamOverloadedError } from "../../server/errors.js";
import { registerAnalysisRoutes } from "../../server/http/routes/analyses.js";
import type { RecordStore } from "../../server/storage/contracts.js";
import { createUnavailableRecordStore } from "../../server/storage/unavailableStore.js";
import type { AnalysisOutcome } from "../../server/types/contracts.js";
import { createRouteHarness, invokeRoute, passThroughUpload } from "../helpers/routeHarness.js";
import { createTempStore } from "../helpers/tempStore.js";

const outcome: AnalysisOutcome = {
  result: { executive_summary: "A booking tool for clinics." },
  parse: "structured",
  notes: []
};

function setup(store: RecordStore = createUnavailableRecordStore()) {
  const analyze = vi.fn<DocumentAnalyzer["analyze"]>(async () => outcome);
  const { app, route } = createRouteHarness();
  registerAnalysisRoutes(app as never, {
    analyzer: { analyze },
    store,
    uploadSingleFile: passThroughUpload
  });
  return { analyze, route };
}

describe("Analysis Routes", () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const cleanup of cleanups.splice(0)) {
      await cleanup();
    }
  });

  it("analyzes pasted text and reports that nothing was stored", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { analyze, route } = setup();

    const response = await invokeRoute(route("POST", "/api/analyze-document"), {
      body: { document_content: "Clinic booking PRD", analysis_type: "summary" }
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({
      analysis_result: { executive_summary: "A booking tool for clinics." },
      analysis_type: "summary",
      document_length: 18,
      user_id: null,
      notes: [],
      persisted: false
    });
    expect(response.body).not.toHaveProperty("filename");
    expect(analyze).toHaveBeenCalledWith("Clinic booking PRD", "summary", { signal: expect.any(AbortSignal) });
  });

  it("defaults to gap analysis", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { analyze, route } = setup();

    await invokeRoute(route("POST", "/api/analyze-document"), { body: { document_content: "Doc" } });

    expect(analyze.mock.calls[0]?.[1]).toBe("gap_analysis");
  });

  it("rejects blank documents and unknown analysis types", async () => {
    const { analyze, route } = setup();

    const blank = await invokeRoute(route("POST", "/api/analyze-document"), { body: { document_content: "   " } });
    const unknown = await invokeRoute(route("POST", "/api/analyze-document"), {
      body: { document_content: "Doc", analysis_type: "poem" }
    });

    expect(blank.statusCode).toBe(400);
    expect(blank.body).toMatchObject({ error: "Validation failed" });
    expect(unknown.statusCode).toBe(400);
    expect(analyze).not.toHaveBeenCalled();
  });

  it("rejects unsupported uploads before calling the model", async () => {
    const { analyze, route } = setup();

    const response = await invokeRoute(route("POST", "/api/analyze-document-file"), {
      body: { analysis_type: "summary" },
      file: { originalname: "diagram.jpg", buffer: Buffer.from("jpg") }
    });

    expect(response.statusCode).toBe(400);
    expect(response.body).toEqual({
      error: "Unsupported file type. Please upload PDF, DOCX, TXT, or MD files.",
      code: "unsupported_file_type"
    });
    expect(analyze).not.toHaveBeenCalled();
  });

  it("requires an uploaded file", async () => {
    const { route } = setup();

    const response = await invokeRoute(route("POST", "/api/analyze-document-file"), { body: {} });

    expect(response.statusCode).toBe(400);
    expect(response.body).toMatchObject({ code: "unreadable_document" });
  });

  it("maps upstream failures to their status", async () => {
    const { analyze, route } = setup();
    analyze.mockRejectedValue(new UpstreamOverloadedError());

    const response = await invokeRoute(route("POST", "/api/analyze-document"), { body: { document_content: "Doc" } });

    expect(response.statusCode).toBe(503);
    expect(response.body).toEqual({
      error: "AI service is currently overloaded. Please try again in a few minutes.",
      code: "upstream_overloaded"
    });
  });

  it("returns 503 for history while persistence is disabled", async () => {
    const { route } = setup();

    const list = await invokeRoute(route("GET", "/api/analyses"));
    const single = await invokeRoute(route("GET", "/api/analyses/:analysisId"), { params: { analysisId: "a1" } });

    expect(list.statusCode).toBe(503);
    expect(list.body).toEqual({
      error: "Storage is not available on this backend (list analyses).",
      code: "storage_unavailable"
    });
    expect(single.statusCode).toBe(503);
  });

  it("stores uploaded analyses for their owner", async () => {
    const temp = await createTempStore();
    cleanups.push(temp.cleanup);
    const { route } = setup(temp.store);

    const created = await invokeRoute(route("POST", "/api/analyze-document-file"), {
      body: { analysis_type: "summary" },
      file: { originalname: "prd.md", buffer: Buffer.from("# Clinic booking\n") },
      locals: { userId: "user-1" }
    });

    expect(created.statusCode).toBe(200);
    expect(created.body).toMatchObject({
      filename: "prd.md",
      document_length: 16,
      user_id: "user-1",
      persisted: true
    });
    const { id } = created.body as { id: string };

    const mine = await invokeRoute(route("GET", "/api/analyses"), { locals: { userId: "user-1" } });
    const anonymous = await invokeRoute(route("GET", "/api/analyses"));
    expect(mine.body).toMatchObject({ analyses: [{ id, filename: "prd.md" }] });
    expect(anonymous.body).toEqual({ analyses: [] });

    const fetched = await invokeRoute(route("GET", "/api/analyses/:analysisId"), {
      params: { analysisId: id },
      locals: { userId: "user-1" }
    });
    const hidden = await invokeRoute(route("GET", "/api/analyses/:analysisId"), {
      params: { analysisId: id },
      locals: { userId: "user-2" }
    });
    expect(fetched.statusCode).toBe(200);
    expect(fetched.body).not.toHaveProperty("notes");
    expect(hidden.statusCode).toBe(404);
    expect(hidden.body).toEqual({ error: "Analysis not found.", code: "not_found" });
  });
});
