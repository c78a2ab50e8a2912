/**
 * Storage-side document types for the workout planner.
 */

import type { mongo } from "mongoose";

export const WORKOUT_COLLECTION = "workout";

export type ObjectId = mongo.ObjectId;

/** Any document read back from a collection. */
export type StoredDocument = { _id: ObjectId } & Record<string, unknown>;

/** A field-equality filter; an empty object matches every document. */
export type DocumentFilter = Record<string, string | number | boolean | null>;

export interface UpdateResult {
  matchedCount: number;
}

export interface DeleteResult {
  deletedCount: number;
}

export interface StoreDiagnostics {
  urlConfigured: boolean;
  nameConfigured: boolean;
  connected: boolean;
  collections: string[];
  /** Message of the failure that stopped introspection, if any. */
  error: string | null;
}

/**
 * Persistence surface the routers depend on. Implemented over MongoDB by
 * MongoDocumentStore; tests substitute an in-memory version.
 */
export interface DocumentStore {
  connect(): Promise<void>;
  close(): Promise<void>;
  createDocument(collection: string, item: Record<string, unknown>): Promise<ObjectId>;
  getDocuments(collection: string, filter?: DocumentFilter): Promise<StoredDocument[]>;
  findDocument(collection: string, id: ObjectId): Promise<StoredDocument | null>;
  updateDocument(collection: string, id: ObjectId, changes: Record<string, unknown>): Promise<UpdateResult>;
  deleteDocument(collection: string, id: ObjectId): Promise<DeleteResult>;
  describe(): Promise<StoreDiagnostics>;
}
