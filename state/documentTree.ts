import { isJsonObject, type JsonObject, type JsonValue } from "./counterStore.js";

export function splitPath(path: string): readonly string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

export function joinPath(segments: readonly string[]): string {
  return `/${segments.join("/")}`;
}

export function getAt(node: JsonValue | undefined, segments: readonly string[]): JsonValue | undefined {
  let current = node;
  for (const segment of segments) {
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Replaces the subtree at `segments`. Writing `null` or an empty object
 * removes the subtree, and parents left empty are removed with it.
 */
export function setAt(
  node: JsonValue | undefined,
  segments: readonly string[],
  value: JsonValue,
): JsonValue | undefined {
  const [head, ...rest] = segments;
  if (head === undefined) return prune(value);

  const copy: JsonObject = isJsonObject(node) ? { ...node } : {};
  const child = setAt(copy[head], rest, value);
  if (child === undefined) {
    delete copy[head];
  } else {
    copy[head] = child;
  }

  return Object.keys(copy).length > 0 ? copy : undefined;
}

function prune(value: JsonValue): JsonValue | undefined {
  if (value === null) return undefined;
  if (!isJsonObject(value)) return value;

  const result: JsonObject = {};
  for (const [key, child] of Object.entries(value)) {
    const pruned = prune(child);
    if (pruned !== undefined) {
      result[key] = pruned;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

/** Flattens a document into `[path, leaf]` pairs below `basePath`. */
export function flattenLeaves(basePath: string, value: JsonValue): Array<[string, JsonValue]> {
  if (value === null) return [];
  if (!isJsonObject(value)) return [[basePath, value]];

  return Object.entries(value).flatMap(([key, child]) => flattenLeaves(`${basePath}/${key}`, child));
}
