import { Router } from "express";
import type { DocumentStore, StoreDiagnostics } from "../db/types.js";

const API_NAME = "Workout Planner API";

const MAX_ERROR_LENGTH = 50;

interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: "Connected" | "Not Connected";
  collections: string[];
}

function truncate(message: string): string {
  return message.slice(0, MAX_ERROR_LENGTH);
}

function databaseStatus(diagnostics: StoreDiagnostics): string {
  if (!diagnostics.urlConfigured) return "⚠️  Available but not initialized";
  if (!diagnostics.connected) return `❌ Error: ${truncate(diagnostics.error ?? "not connected")}`;
  if (diagnostics.error) return `⚠️  Connected but Error: ${truncate(diagnostics.error)}`;
  return "✅ Connected & Working";
}

export function buildDiagnosticsReport(diagnostics: StoreDiagnostics): DiagnosticsReport {
  return {
    backend: "✅ Running",
    database: databaseStatus(diagnostics),
    database_url: diagnostics.urlConfigured ? "✅ Set" : "❌ Not Set",
    database_name: diagnostics.nameConfigured ? "✅ Set" : "❌ Not Set",
    connection_status: diagnostics.connected ? "Connected" : "Not Connected",
    collections: diagnostics.collections,
  };
}

/**
 * Liveness (`GET /`) and database diagnostics (`GET /test`). Neither endpoint
 * fails: introspection problems are reported inside the payload.
 */
export function createDiagnosticsRouter(store: DocumentStore): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ message: API_NAME });
  });

  router.get("/test", async (_req, res) => {
    let diagnostics: StoreDiagnostics;
    try {
      diagnostics = await store.describe();
    } catch (err) {
      console.error("[diagnostics] describe() failed:", err instanceof Error ? err.stack : err);
      diagnostics = {
        urlConfigured: true,
        nameConfigured: false,
        connected: false,
        collections: [],
        error: err instanceof Error ? err.message : String(err),
      };
    }
    res.json(buildDiagnosticsReport(diagnostics));
  });

  return router;
}
