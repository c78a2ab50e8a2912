import "dotenv/config";
import type { Server } from "node:http";
import { createApp } from "./src/app.js";
import { loadConfig } from "./src/config.js";
import { isConfigured } from "./src/db/connection.js";
import { MongoDocumentStore } from "./src/db/document-store.js";
import type { DocumentStore } from "./src/db/types.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;

function stopAccepting(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Stops the HTTP listener first so no request is mid-flight when the store
 * goes away. Exits non-zero if either step fails or the deadline passes.
 */
function registerShutdown(server: Server, store: DocumentStore) {
  let stopping = false;

  const onSignal = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] ${signal}: draining connections`);

    const deadline = setTimeout(() => {
      console.error(`[server] Still draining after ${SHUTDOWN_TIMEOUT_MS} ms, exiting`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    deadline.unref();

    try {
      await stopAccepting(server);
      await store.close();
      console.log("[server] Stopped");
      process.exit(0);
    } catch (err) {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    }
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => void onSignal(signal));
  }
}

async function start() {
  try {
    const config = loadConfig();
    const store = new MongoDocumentStore(config.database);

    if (isConfigured(config.database)) {
      await store.connect();
    } else {
      console.warn("[db] DATABASE_URL is not set; workout endpoints will answer 503.");
    }

    const server = createApp(store).listen(config.port, () => {
      console.log(`Workout Planner API running on port ${config.port}`);
    });
    registerShutdown(server, store);
  } catch (err) {
    console.error("Failed to start:", err);
    process.exit(1);
  }
}

void start();
