import mongoose from "mongoose";
import type { Connection } from "mongoose";
import type { DatabaseConfig } from "../config.js";

export type Connector = (url: string, dbName: string | undefined) => Promise<Connection>;

/**
 * Opens a dedicated mongoose connection (not the mongoose default one), so the
 * process can own exactly one handle and close it on shutdown.
 */
export const openConnection: Connector = async (url, dbName) => {
  const connection = mongoose.createConnection(url, {
    ...(dbName ? { dbName } : {}),
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5_000,
  });
  return connection.asPromise();
};

export function isConfigured(config: DatabaseConfig): config is DatabaseConfig & { url: string } {
  return typeof config.url === "string" && config.url.length > 0;
}
