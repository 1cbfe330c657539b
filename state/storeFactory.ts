import type { StoreConfig } from "../config/store.js";
import { logger } from "../config/logger.js";
import type { CounterStore } from "./counterStore.js";
import { FirebaseCounterStore } from "./firebaseStore.js";
import { MemoryCounterStore } from "./memoryStore.js";
import { SqliteCounterStore, openUsageDatabase } from "./sqliteStore.js";

/** Resolves the configured backend once at startup; null means the store is unavailable. */
export function createCounterStore(config: StoreConfig): CounterStore | null {
  switch (config.kind) {
    case "firebase":
      if (!config.firebaseUrl) {
        logger.warn("USAGE_STORE is firebase but FIREBASE_DB_URL is not set");
        return null;
      }
      return new FirebaseCounterStore({
        baseUrl: config.firebaseUrl,
        authToken: config.firebaseAuthToken,
        timeoutMs: config.timeoutMs,
      });
    case "sqlite":
      try {
        return new SqliteCounterStore(openUsageDatabase(config.sqlitePath));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ sqlitePath: config.sqlitePath, error: message }, "Usage database failed to open");
        return null;
      }
    case "memory":
      return new MemoryCounterStore();
    case "none":
      return null;
  }
}
