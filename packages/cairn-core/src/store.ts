// The key-value collaborator that command handlers read and write.

import { binaryStringToBytes, bytesToBinaryString } from "@cairn/wire";

/** Stored value. `null` is a stored absent value, read back as absent. */
export type StoreValue = Uint8Array | null;

/**
 * Interface for the shared key-value store.
 *
 * Keys are opaque byte strings. Methods return promises so that a store
 * backed by something slower than memory can be dropped in.
 */
export interface Store {
  /** Value for `key`, or null when the key is not present. */
  get(key: Uint8Array): Promise<StoreValue>;

  /** Insert or replace. Always resolves to 1. */
  set(key: Uint8Array, value: StoreValue): Promise<1>;

  /** Remove `key`. Resolves to true when it was present. */
  delete(key: Uint8Array): Promise<boolean>;

  /** Remove every entry. Resolves to the number removed. */
  clear(): Promise<number>;

  /** One value (or null) per key, in order. */
  multiGet(keys: readonly Uint8Array[]): Promise<StoreValue[]>;

  /** Write every pair in order. Resolves to the number of pairs written. */
  multiSet(pairs: ReadonlyArray<readonly [Uint8Array, StoreValue]>): Promise<number>;
}

/** In-memory store. Nothing survives the process. */
export class MemoryStore implements Store {
  private entries = new Map<string, StoreValue>();

  get size(): number {
    return this.entries.size;
  }

  async get(key: Uint8Array): Promise<StoreValue> {
    return this.entries.get(bytesToBinaryString(key)) ?? null;
  }

  async set(key: Uint8Array, value: StoreValue): Promise<1> {
    this.entries.set(bytesToBinaryString(key), value);
    return 1;
  }

  async delete(key: Uint8Array): Promise<boolean> {
    return this.entries.delete(bytesToBinaryString(key));
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  async multiGet(keys: readonly Uint8Array[]): Promise<StoreValue[]> {
    return keys.map((key) => this.entries.get(bytesToBinaryString(key)) ?? null);
  }

  async multiSet(pairs: ReadonlyArray<readonly [Uint8Array, StoreValue]>): Promise<number> {
    for (const [key, value] of pairs) {
      this.entries.set(bytesToBinaryString(key), value);
    }
    return pairs.length;
  }

  /** Stored keys, in insertion order. */
  keys(): Uint8Array[] {
    return [...this.entries.keys()].map(binaryStringToBytes);
  }
}
