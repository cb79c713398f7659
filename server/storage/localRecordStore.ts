import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { EmailTakenError } from "../errors.js";
import type { AnalysisRecord, UserRecord, WorkflowRecord } from "../types/contracts.js";
import { ANALYSIS_KINDS, WORKFLOW_KINDS } from "../types/contracts.js";
import { graphNodeSchema, jsonValueSchema } from "../workflow/schemas.js";
import type { OwnedRecord, PersistenceStatus, RecordRepository, RecordStore, UserRepository } from "./contracts.js";

export const MAX_RECORDS_PER_COLLECTION = 500;
export const RECORD_DB_FILENAME = "records-db.json";

const analysisRecordSchema = z.object({
  id: z.string(),
  documentContent: z.string(),
  analysisResult: z.record(jsonValueSchema),
  analysisType: z.enum(ANALYSIS_KINDS),
  documentLength: z.number().int().nonnegative(),
  filename: z.string().nullable(),
  timestamp: z.string(),
  userId: z.string().nullable()
});

const workflowRecordSchema = z.object({
  id: z.string(),
  documentContent: z.string(),
  workflowNodes: z.array(graphNodeSchema),
  workflowType: z.enum(WORKFLOW_KINDS),
  documentLength: z.number().int().nonnegative(),
  source: z.enum(["model", "fallback"]),
  filename: z.string().nullable(),
  timestamp: z.string(),
  userId: z.string().nullable()
});

const userRecordSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  hashedPassword: z.string(),
  createdAt: z.string(),
  isActive: z.boolean()
});

const recordDbSchema = z.object({
  analyses: z.array(analysisRecordSchema).default([]),
  workflows: z.array(workflowRecordSchema).default([]),
  users: z.array(userRecordSchema).default([])
});

type RecordDb = z.infer<typeof recordDbSchema>;

function emptyDb(): RecordDb {
  return { analyses: [], workflows: [], users: [] };
}

function deepClone<T>(value: T): T {
  return structuredClone(value);
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

class LocalCollection<T extends OwnedRecord> implements RecordRepository<T> {
  constructor(
    private readonly read: () => T[],
    private readonly write: (entries: T[]) => void
  ) {}

  async save(record: T): Promise<T> {
    const stored = deepClone(record);
    const next = [stored, ...this.read().filter((entry) => entry.id !== record.id)];
    this.write(next.slice(0, MAX_RECORDS_PER_COLLECTION));
    return deepClone(stored);
  }

  async get(id: string, owner: string | null): Promise<T | undefined> {
    const match = this.read().find((entry) => entry.id === id && entry.userId === owner);
    return match ? deepClone(match) : undefined;
  }

  async list(owner: string | null): Promise<T[]> {
    return this.read()
      .filter((entry) => entry.userId === owner)
      .map((entry) => deepClone(entry));
  }
}

/**
 * Synchronous JSON-file store. The whole database is held in memory and rewritten on
 * every save; collections keep the newest records first.
 */
export class LocalRecordStore implements RecordStore {
  private state: RecordDb;
  readonly analyses: RecordRepository<AnalysisRecord>;
  readonly workflows: RecordRepository<WorkflowRecord>;
  readonly users: UserRepository;

  constructor(private readonly dbPath: string) {
    this.ensureDbFile();
    this.state = this.load();
    this.analyses = new LocalCollection<AnalysisRecord>(
      () => this.state.analyses,
      (entries) => {
        this.state.analyses = entries;
        this.persist();
      }
    );
    this.workflows = new LocalCollection<WorkflowRecord>(
      () => this.state.workflows,
      (entries) => {
        this.state.workflows = entries;
        this.persist();
      }
    );
    this.users = this.createUserRepository();
  }

  describe(): PersistenceStatus {
    return {
      mode: "file",
      available: true,
      detail: `Records are stored in ${this.dbPath}.`
    };
  }

  private ensureDbFile(): void {
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    if (!fs.existsSync(this.dbPath)) {
      fs.writeFileSync(this.dbPath, JSON.stringify(emptyDb(), null, 2), "utf8");
    }
  }

  private load(): RecordDb {
    const raw = fs.readFileSync(this.dbPath, "utf8");
    const parsed: unknown = raw.trim().length > 0 ? JSON.parse(raw) : {};
    return recordDbSchema.parse(parsed);
  }

  private persist(): void {
    fs.writeFileSync(this.dbPath, JSON.stringify(this.state, null, 2), "utf8");
  }

  private createUserRepository(): UserRepository {
    return {
      create: async (user: UserRecord) => {
        const email = normalizeEmail(user.email);
        if (this.state.users.some((entry) => entry.email === email)) {
          throw new EmailTakenError();
        }

        const stored = { ...deepClone(user), email };
        this.state.users = [...this.state.users, stored];
        this.persist();
        return deepClone(stored);
      },
      findByEmail: async (email: string) => {
        const normalized = normalizeEmail(email);
        const match = this.state.users.find((entry) => entry.email === normalized);
        return match ? deepClone(match) : undefined;
      },
      findById: async (id: string) => {
        const match = this.state.users.find((entry) => entry.id === id);
        return match ? deepClone(match) : undefined;
      }
    };
  }
}
