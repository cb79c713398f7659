import { StorageUnavailableError } from "../errors.js";
import type { UserRecord } from "../types/contracts.js";
import type { OwnedRecord, PersistenceStatus, RecordRepository, RecordStore, UserRepository } from "./contracts.js";

class UnavailableRecordRepository<T extends OwnedRecord> implements RecordRepository<T> {
  constructor(private readonly collection: string) {}

  async save(): Promise<T> {
    throw new StorageUnavailableError(`save ${this.collection}`);
  }

  async get(): Promise<T | undefined> {
    throw new StorageUnavailableError(`get ${this.collection}`);
  }

  async list(): Promise<T[]> {
    throw new StorageUnavailableError(`list ${this.collection}`);
  }
}

class UnavailableUserRepository implements UserRepository {
  async create(): Promise<UserRecord> {
    throw new StorageUnavailableError("create user");
  }

  async findByEmail(): Promise<UserRecord | undefined> {
    throw new StorageUnavailableError("find user");
  }

  async findById(): Promise<UserRecord | undefined> {
    throw new StorageUnavailableError("find user");
  }
}

export function createUnavailableRecordStore(): RecordStore {
  const status: PersistenceStatus = {
    mode: "disabled",
    available: false,
    detail: "Persistence is disabled; results are returned but not stored."
  };

  return {
    analyses: new UnavailableRecordRepository("analyses"),
    workflows: new UnavailableRecordRepository("workflows"),
    users: new UnavailableUserRepository(),
    describe: () => status
  };
}
