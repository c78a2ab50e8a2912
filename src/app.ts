import express from "express";
import type { Express } from "express";
import cors from "cors";
import type { DocumentStore } from "./db/types.js";
import { errorHandler } from "./helpers/http-response.js";
import { createDiagnosticsRouter } from "./routes/diagnostics.js";
import { createWorkoutsRouter } from "./routes/workouts.js";

/**
 * Builds the HTTP application around a store. The store is injected so tests
 * can run the real routes against an in-memory implementation.
 */
export function createApp(store: DocumentStore): Express {
  const app = express();

  // Any origin, method and header.
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use(createDiagnosticsRouter(store));
  app.use("/api/workouts", createWorkoutsRouter(store));

  app.use((_req, res) => {
    res.status(404).json({ detail: "Not Found" });
  });
  app.use(errorHandler);

  return app;
}
