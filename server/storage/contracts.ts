import type { AnalysisRecord, UserRecord, WorkflowRecord } from "../types/contracts.js";

export type PersistenceMode = "disabled" | "file";

export interface PersistenceStatus {
  mode: PersistenceMode;
  available: boolean;
  detail: string;
}

export interface OwnedRecord {
  id: string;
  userId: string | null;
}

/**
 * Append-only record collection. `owner` scopes reads: a user id sees only that user's
 * records, `null` sees only anonymous ones.
 */
export interface RecordRepository<T extends OwnedRecord> {
  save(record: T): Promise<T>;
  get(id: string, owner: string | null): Promise<T | undefined>;
  list(owner: string | null): Promise<T[]>;
}

export interface UserRepository {
  create(user: UserRecord): Promise<UserRecord>;
  findByEmail(email: string): Promise<UserRecord | undefined>;
  findById(id: string): Promise<UserRecord | undefined>;
}

export interface RecordStore {
  analyses: RecordRepository<AnalysisRecord>;
  workflows: RecordRepository<WorkflowRecord>;
  users: UserRepository;
  describe(): PersistenceStatus;
}
