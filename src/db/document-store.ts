import { mongo } from "mongoose";
import type { Connection } from "mongoose";
import type { DatabaseConfig } from "../config.js";
import { ApiError } from "../errors.js";
import { isConfigured, openConnection, type Connector } from "./connection.js";
import type {
  DeleteResult,
  DocumentFilter,
  DocumentStore,
  ObjectId,
  StoreDiagnostics,
  StoredDocument,
  UpdateResult,
} from "./types.js";

const DUPLICATE_KEY = 11000;
const MAX_LISTED_COLLECTIONS = 10;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps driver failures onto API error kinds. Errors that are neither a
 * conflict nor a connectivity problem are returned unchanged.
 */
export function classifyDriverError(err: unknown): unknown {
  if (err instanceof ApiError) return err;
  if (err instanceof mongo.MongoServerError && err.code === DUPLICATE_KEY) {
    return new ApiError("Conflict", "A document with the same key already exists");
  }
  if (
    err instanceof mongo.MongoNetworkError ||
    err instanceof mongo.MongoServerSelectionError ||
    err instanceof mongo.MongoNotConnectedError ||
    (err instanceof Error && err.name === "MongooseServerSelectionError")
  ) {
    return new ApiError("Unavailable", "Database is unavailable");
  }
  return err;
}

/**
 * MongoDB-backed DocumentStore. Holds one connection for the life of the
 * process: opened by connect() (or by the first operation), released by close().
 */
export class MongoDocumentStore implements DocumentStore {
  private connection: Connection | null = null;
  private pending: Promise<Connection> | null = null;
  /** Bumped by close(); a connect that settles under an older generation is discarded. */
  private generation = 0;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly connector: Connector = openConnection,
  ) {}

  async connect(): Promise<void> {
    await this.getConnection();
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.generation += 1;
    this.connection = null;
    this.pending = null;
    if (connection) {
      await connection.close();
      console.log("[db] Connection closed");
    }
  }

  async createDocument(collection: string, item: Record<string, unknown>): Promise<ObjectId> {
    const target = await this.collection(collection);
    const _id = new mongo.ObjectId();
    try {
      await target.insertOne({ ...item, _id });
    } catch (err) {
      throw classifyDriverError(err);
    }
    return _id;
  }

  async getDocuments(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    const target = await this.collection(collection);
    try {
      return await target.find({ ...filter }).toArray();
    } catch (err) {
      throw classifyDriverError(err);
    }
  }

  async findDocument(collection: string, id: ObjectId): Promise<StoredDocument | null> {
    const target = await this.collection(collection);
    try {
      return await target.findOne({ _id: id });
    } catch (err) {
      throw classifyDriverError(err);
    }
  }

  /**
   * Applies `changes` with $set and stamps `updated_at` from the database
   * server clock.
   */
  async updateDocument(
    collection: string,
    id: ObjectId,
    changes: Record<string, unknown>,
  ): Promise<UpdateResult> {
    const target = await this.collection(collection);
    try {
      const result = await target.updateOne(
        { _id: id },
        { $set: { ...changes }, $currentDate: { updated_at: true } },
      );
      return { matchedCount: result.matchedCount };
    } catch (err) {
      throw classifyDriverError(err);
    }
  }

  async deleteDocument(collection: string, id: ObjectId): Promise<DeleteResult> {
    const target = await this.collection(collection);
    try {
      const result = await target.deleteOne({ _id: id });
      return { deletedCount: result.deletedCount };
    } catch (err) {
      throw classifyDriverError(err);
    }
  }

  async describe(): Promise<StoreDiagnostics> {
    const diagnostics: StoreDiagnostics = {
      urlConfigured: isConfigured(this.config),
      nameConfigured: Boolean(this.config.name),
      connected: false,
      collections: [],
      error: null,
    };
    if (!diagnostics.urlConfigured) return diagnostics;

    let db: mongo.Db;
    try {
      db = await this.database();
    } catch (err) {
      return { ...diagnostics, error: errorMessage(err) };
    }
    diagnostics.connected = true;

    try {
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      diagnostics.collections = collections.map((c) => c.name).slice(0, MAX_LISTED_COLLECTIONS);
    } catch (err) {
      diagnostics.error = errorMessage(err);
    }
    return diagnostics;
  }

  private getConnection(): Promise<Connection> {
    if (this.connection) return Promise.resolve(this.connection);
    if (!isConfigured(this.config)) {
      return Promise.reject(new ApiError("Unavailable", "Database is not configured"));
    }
    if (!this.pending) {
      const generation = this.generation;
      this.pending = this.connector(this.config.url, this.config.name).then(
        async (connection) => {
          if (generation !== this.generation) {
            await connection.close();
            throw new ApiError("Unavailable", "Database connection was closed");
          }
          this.connection = connection;
          console.log(`[db] Connected to database "${connection.name}"`);
          return connection;
        },
        (err: unknown) => {
          if (generation === this.generation) this.pending = null;
          console.error("[db] Connection failed:", errorMessage(err));
          throw classifyDriverError(err);
        },
      );
    }
    return this.pending;
  }

  private async database(): Promise<mongo.Db> {
    const connection = await this.getConnection();
    const db = connection.db;
    if (!db) {
      throw new ApiError("Unavailable", "Database connection is not ready");
    }
    return db;
  }

  private async collection(name: string): Promise<mongo.Collection> {
    const db = await this.database();
    return db.collection(name);
  }
}
