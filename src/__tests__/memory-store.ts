import { mongo } from "mongoose";
import { ApiError } from "../errors.js";
import type {
  DeleteResult,
  DocumentFilter,
  DocumentStore,
  ObjectId,
  StoreDiagnostics,
  StoredDocument,
  UpdateResult,
} from "../db/types.js";

/**
 * In-process DocumentStore for route tests. Mirrors the Mongo store's
 * observable behavior: exact-match filters, $set semantics and an
 * `updated_at` stamp on every update.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly data = new Map<string, Map<string, StoredDocument>>();
  available = true;

  async connect(): Promise<void> {}

  async close(): Promise<void> {}

  async createDocument(collection: string, item: Record<string, unknown>): Promise<ObjectId> {
    const docs = this.collectionFor(collection);
    const _id = new mongo.ObjectId();
    docs.set(_id.toHexString(), { ...item, _id });
    return _id;
  }

  async getDocuments(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    const docs = [...this.collectionFor(collection).values()];
    return docs
      .filter((doc) => Object.entries(filter).every(([key, value]) => doc[key] === value))
      .map((doc) => ({ ...doc }));
  }

  async findDocument(collection: string, id: ObjectId): Promise<StoredDocument | null> {
    const doc = this.collectionFor(collection).get(id.toHexString());
    return doc ? { ...doc } : null;
  }

  async updateDocument(
    collection: string,
    id: ObjectId,
    changes: Record<string, unknown>,
  ): Promise<UpdateResult> {
    const docs = this.collectionFor(collection);
    const existing = docs.get(id.toHexString());
    if (!existing) return { matchedCount: 0 };
    docs.set(id.toHexString(), { ...existing, ...changes, updated_at: new Date() });
    return { matchedCount: 1 };
  }

  async deleteDocument(collection: string, id: ObjectId): Promise<DeleteResult> {
    const deleted = this.collectionFor(collection).delete(id.toHexString());
    return { deletedCount: deleted ? 1 : 0 };
  }

  async describe(): Promise<StoreDiagnostics> {
    return {
      urlConfigured: true,
      nameConfigured: true,
      connected: this.available,
      collections: this.available ? [...this.data.keys()] : [],
      error: this.available ? null : "connect ECONNREFUSED 127.0.0.1:27017",
    };
  }

  private collectionFor(name: string): Map<string, StoredDocument> {
    if (!this.available) {
      throw new ApiError("Unavailable", "Database is unavailable");
    }
    let docs = this.data.get(name);
    if (!docs) {
      docs = new Map();
      this.data.set(name, docs);
    }
    return docs;
  }
}
