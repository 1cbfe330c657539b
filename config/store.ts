import { ConfigError, readIntEnv, readOptionalEnv } from "./env.js";

export type UsageStoreKind = "firebase" | "sqlite" | "memory" | "none";

export interface StoreConfig {
  readonly kind: UsageStoreKind;
  readonly firebaseUrl?: string;
  readonly firebaseAuthToken?: string;
  readonly sqlitePath: string;
  readonly timeoutMs: number;
}

const VALID_STORE_KINDS: readonly UsageStoreKind[] = ["firebase", "sqlite", "memory", "none"];
const DEFAULT_SQLITE_PATH = "state/usage.db";

export function loadStoreConfig(): StoreConfig {
  const firebaseUrl = readOptionalEnv("FIREBASE_DB_URL")?.replace(/\/+$/, "");

  return {
    kind: resolveStoreKind(readOptionalEnv("USAGE_STORE"), firebaseUrl),
    firebaseUrl,
    firebaseAuthToken: readOptionalEnv("FIREBASE_AUTH_TOKEN"),
    sqlitePath: readOptionalEnv("USAGE_SQLITE_PATH") ?? DEFAULT_SQLITE_PATH,
    timeoutMs: readIntEnv("STORE_TIMEOUT_MS", 10_000),
  };
}

function resolveStoreKind(raw: string | undefined, firebaseUrl: string | undefined): UsageStoreKind {
  if (raw === undefined) {
    return firebaseUrl ? "firebase" : "none";
  }

  const kind = VALID_STORE_KINDS.find((candidate) => candidate === raw.toLowerCase());
  if (!kind) {
    throw new ConfigError(
      `USAGE_STORE must be one of ${VALID_STORE_KINDS.join(", ")}, got "${raw}"`,
    );
  }
  return kind;
}
