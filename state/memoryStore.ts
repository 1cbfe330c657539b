import { ABSENT, present, type CounterStore, type JsonValue, type StoreRead } from "./counterStore.js";
import { getAt, setAt, splitPath } from "./documentTree.js";

/**
 * Process-local document tree. Reads and writes are independent operations
 * like the remote store's, so read-then-write increments can lose updates
 * when requests interleave.
 */
export class MemoryCounterStore implements CounterStore {
  readonly name = "memory";
  private root: JsonValue | undefined;

  constructor(initial?: JsonValue) {
    this.root = initial === undefined ? undefined : setAt(undefined, [], initial);
  }

  async read(path: string): Promise<StoreRead> {
    const value = getAt(this.root, splitPath(path));
    return value === undefined ? ABSENT : present(structuredClone(value));
  }

  async write(path: string, value: JsonValue): Promise<boolean> {
    this.root = setAt(this.root, splitPath(path), structuredClone(value));
    return true;
  }

  snapshot(): JsonValue | undefined {
    return this.root === undefined ? undefined : structuredClone(this.root);
  }
}
