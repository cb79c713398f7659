import { afterEach, describe, expect, it } from "vitest";

import { EmailTakenError, StorageUnavailableError } from "../../server/errors.js";
import { LocalRecordStore } from "../../server/storage/localRecordStore.js";
import { createUnavailableRecordStore } from "../../server/storage/unavailableStore.js";
import type { AnalysisRecord, UserRecord } from "../../server/types/contracts.js";
import { createTempStore } from "../helpers/tempStore.js";

function analysisRecord(id: string, userId: string | null): AnalysisRecord {
  return {
    id,
    documentContent: "Doc",
    analysisResult: { executive_summary: id },
    analysisType: "summary",
    documentLength: 3,
    filename: null,
    timestamp: "2026-01-01T00:00:00.000Z",
    userId
  };
}

function userRecord(id: string, email: string): UserRecord {
  return {
    id,
    email,
    name: "Test User",
    hashedPassword: "hashed",
    createdAt: "2026-01-01T00:00:00.000Z",
    isActive: true
  };
}

describe("local record store", () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const cleanup of cleanups.splice(0)) {
      await cleanup();
    }
  });

  async function openStore() {
    const temp = await createTempStore();
    cleanups.push(temp.cleanup);
    return temp;
  }

  it("lists records newest first within the owner scope", async () => {
    const { store } = await openStore();
    await store.analyses.save(analysisRecord("a1", "user-1"));
    await store.analyses.save(analysisRecord("a2", "user-1"));
    await store.analyses.save(analysisRecord("a3", null));

    expect((await store.analyses.list("user-1")).map((record) => record.id)).toEqual(["a2", "a1"]);
    expect((await store.analyses.list(null)).map((record) => record.id)).toEqual(["a3"]);
    expect(await store.analyses.list("user-2")).toEqual([]);
  });

  it("hides records owned by someone else", async () => {
    const { store } = await openStore();
    await store.analyses.save(analysisRecord("a1", "user-1"));

    expect((await store.analyses.get("a1", "user-1"))?.id).toBe("a1");
    expect(await store.analyses.get("a1", "user-2")).toBeUndefined();
    expect(await store.analyses.get("a1", null)).toBeUndefined();
  });

  it("hands out copies", async () => {
    const { store } = await openStore();
    const saved = await store.analyses.save(analysisRecord("a1", null));
    saved.analysisResult.executive_summary = "changed";

    expect((await store.analyses.get("a1", null))?.analysisResult).toEqual({ executive_summary: "a1" });
  });

  it("reloads saved records from disk", async () => {
    const { store, dbPath } = await openStore();
    await store.analyses.save(analysisRecord("a1", "user-1"));
    await store.users.create(userRecord("u1", "ada@example.com"));

    const reopened = new LocalRecordStore(dbPath);

    expect((await reopened.analyses.list("user-1")).map((record) => record.id)).toEqual(["a1"]);
    expect((await reopened.users.findById("u1"))?.email).toBe("ada@example.com");
    expect(reopened.describe()).toEqual({
      mode: "file",
      available: true,
      detail: `Records are stored in ${dbPath}.`
    });
  });

  it("stores emails in lower case and refuses duplicates", async () => {
    const { store } = await openStore();
    const created = await store.users.create(userRecord("u1", "Ada@Example.com"));

    expect(created.email).toBe("ada@example.com");
    expect((await store.users.findByEmail("ADA@example.COM"))?.id).toBe("u1");
    await expect(store.users.create(userRecord("u2", "ada@example.com"))).rejects.toBeInstanceOf(EmailTakenError);
  });
});

describe("unavailable record store", () => {
  it("fails every operation with a storage error", async () => {
    const store = createUnavailableRecordStore();

    await expect(store.analyses.save(analysisRecord("a1", null))).rejects.toMatchObject({
      code: "storage_unavailable",
      statusCode: 503,
      message: "Storage is not available on this backend (save analyses)."
    });
    await expect(store.workflows.list(null)).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(store.users.findByEmail("ada@example.com")).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(store.describe()).toMatchObject({ mode: "disabled", available: false });
  });
});
