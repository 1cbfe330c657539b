export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Result of a store read. A path that was never written (JSON `null` on the
 * wire) and a read that failed are both `absent`; callers resolve absence to
 * their own default.
 */
export type StoreRead =
  | { readonly status: "present"; readonly value: JsonValue }
  | { readonly status: "absent" };

export const ABSENT: StoreRead = { status: "absent" };

export function present(value: JsonValue): StoreRead {
  return value === null ? ABSENT : { status: "present", value };
}

/**
 * Path-addressed document store with independent GET/PUT per path.
 * No compare-and-swap, no multi-key transaction, no TTL.
 * Implementations never throw: failures surface as `absent` or `false`.
 */
export interface CounterStore {
  readonly name: string;
  read(path: string): Promise<StoreRead>;
  write(path: string, value: JsonValue): Promise<boolean>;
}

/** A backend that can add one to an integer at a path without a lost-update window. */
export interface AtomicCounterStore extends CounterStore {
  /** Resolves to the new value, or null when the increment failed. */
  increment(path: string): Promise<number | null>;
}

export function supportsAtomicIncrement(store: CounterStore): store is AtomicCounterStore {
  return "increment" in store && typeof store.increment === "function";
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Coerces a stored counter to a non-negative integer. Numeric strings are
 * accepted because hand-edited documents often hold them.
 */
export function toCount(value: JsonValue | undefined): number | undefined {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric) || numeric < 0) {
    return undefined;
  }
  return Math.trunc(numeric);
}

/** Parses a response body; malformed JSON is reported as absent rather than thrown. */
export function parseStoredDocument(text: string): StoreRead {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return ABSENT;
  }
  return isJsonValue(parsed) ? present(parsed) : ABSENT;
}
