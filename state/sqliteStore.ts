import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import {
  ABSENT,
  isJsonObject,
  parseStoredDocument,
  present,
  toCount,
  type AtomicCounterStore,
  type JsonValue,
  type StoreRead,
} from "./counterStore.js";
import { flattenLeaves, joinPath, setAt, splitPath } from "./documentTree.js";

interface DocumentRow {
  readonly path: string;
  readonly value: string;
}

export function openUsageDatabase(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  applyUsageSchema(db);
  return db;
}

export function applyUsageSchema(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS counter_documents (
      path TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    );
  `);
}

/**
 * Document tree kept as one row per leaf. Unlike the REST backend it can
 * increment inside an immediate transaction, so concurrent increments are
 * never lost.
 */
export class SqliteCounterStore implements AtomicCounterStore {
  readonly name = "sqlite";

  private readonly selectExact: BetterSqlite3.Statement<[string], DocumentRow>;
  private readonly selectBelow: BetterSqlite3.Statement<[string, string], DocumentRow>;
  private readonly deleteExact: BetterSqlite3.Statement<[string]>;
  private readonly deleteBelow: BetterSqlite3.Statement<[string, string]>;
  private readonly upsert: BetterSqlite3.Statement<[string, string]>;
  private readonly replaceTree: (treePath: string, value: JsonValue) => void;
  private readonly incrementLeaf: (leafPath: string) => number;

  constructor(private readonly db: BetterSqlite3.Database) {
    this.selectExact = db.prepare<[string], DocumentRow>(
      "SELECT path, value FROM counter_documents WHERE path = ?",
    );
    this.selectBelow = db.prepare<[string, string], DocumentRow>(
      "SELECT path, value FROM counter_documents WHERE substr(path, 1, length(?)) = ?",
    );
    this.deleteExact = db.prepare<[string]>("DELETE FROM counter_documents WHERE path = ?");
    this.deleteBelow = db.prepare<[string, string]>(
      "DELETE FROM counter_documents WHERE substr(path, 1, length(?)) = ?",
    );
    this.upsert = db.prepare<[string, string]>(
      `INSERT INTO counter_documents (path, value) VALUES (?, ?)
       ON CONFLICT(path) DO UPDATE SET value = excluded.value,
         updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`,
    );

    this.replaceTree = db.transaction((treePath: string, value: JsonValue) => {
      this.replaceUnsafe(treePath, value);
    });
    this.incrementLeaf = db
      .transaction((leafPath: string) => {
        const current = this.readUnsafe(leafPath);
        const base = current.status === "present" ? (toCount(current.value) ?? 0) : 0;
        const next = base + 1;
        this.replaceUnsafe(leafPath, next);
        return next;
      })
      .immediate;
  }

  async read(docPath: string): Promise<StoreRead> {
    try {
      return this.readUnsafe(joinPath(splitPath(docPath)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: docPath, error: message }, "Store read failed");
      return ABSENT;
    }
  }

  async write(docPath: string, value: JsonValue): Promise<boolean> {
    try {
      this.replaceTree(joinPath(splitPath(docPath)), value);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path: docPath, error: message }, "Store write failed");
      return false;
    }
  }

  async increment(docPath: string): Promise<number | null> {
    try {
      return this.incrementLeaf(joinPath(splitPath(docPath)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path: docPath, error: message }, "Store increment failed");
      return null;
    }
  }

  close(): void {
    this.db.close();
  }

  private readUnsafe(docPath: string): StoreRead {
    const exact = this.selectExact.get(docPath);
    if (exact) {
      return parseStoredDocument(exact.value);
    }

    const prefix = `${docPath}/`;
    const rows = this.selectBelow.all(prefix, prefix);
    if (rows.length === 0) return ABSENT;

    let tree: JsonValue | undefined;
    for (const row of rows) {
      const leaf = parseStoredDocument(row.value);
      if (leaf.status === "absent") continue;
      tree = setAt(tree, splitPath(row.path.slice(prefix.length)), leaf.value);
    }

    return isJsonObject(tree) ? present(tree) : ABSENT;
  }

  private replaceUnsafe(docPath: string, value: JsonValue): void {
    const segments = splitPath(docPath);
    for (let depth = 1; depth < segments.length; depth++) {
      this.deleteExact.run(joinPath(segments.slice(0, depth)));
    }

    const prefix = `${docPath}/`;
    this.deleteExact.run(docPath);
    this.deleteBelow.run(prefix, prefix);

    for (const [leafPath, leaf] of flattenLeaves(docPath, value)) {
      this.upsert.run(leafPath, JSON.stringify(leaf));
    }
  }
}
