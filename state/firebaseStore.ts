import { logger } from "../config/logger.js";
import {
  ABSENT,
  parseStoredDocument,
  type CounterStore,
  type JsonValue,
  type StoreRead,
} from "./counterStore.js";
import { splitPath } from "./documentTree.js";

export interface FirebaseStoreOptions {
  readonly baseUrl: string;
  readonly authToken?: string;
  readonly timeoutMs: number;
}

/**
 * Firebase Realtime Database over its REST API. Every call is a single
 * attempt bounded by `timeoutMs`; there is no conditional write, so
 * read-then-write sequences built on top of this store can lose updates.
 */
export class FirebaseCounterStore implements CounterStore {
  readonly name = "firebase";

  constructor(private readonly options: FirebaseStoreOptions) {}

  async read(path: string): Promise<StoreRead> {
    try {
      const response = await fetch(this.buildUrl(path), {
        method: "GET",
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        logger.warn({ path, status: response.status }, "Store read returned non-success status");
        return ABSENT;
      }

      return parseStoredDocument(await response.text());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path, error: message }, "Store read failed");
      return ABSENT;
    }
  }

  async write(path: string, value: JsonValue): Promise<boolean> {
    try {
      const response = await fetch(this.buildUrl(path), {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(value),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text();
        logger.error({ path, status: response.status, body }, "Store write rejected");
        return false;
      }

      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path, error: message }, "Store write failed");
      return false;
    }
  }

  private buildUrl(path: string): string {
    const encodedPath = splitPath(path).map(encodeURIComponent).join("/");
    const url = `${this.options.baseUrl}/${encodedPath}.json`;
    if (!this.options.authToken) return url;
    return `${url}?auth=${encodeURIComponent(this.options.authToken)}`;
  }
}
