// src/device-state/entry-collection.ts

import { DuplicateKeyError } from '../errors.js';
import { CollectionEntry, EntryId } from '../types/mass-types.js';

/**
 * Ordered collection of descriptors keyed by their `id`.
 * Ids are unique; removal of an absent id is a no-op.
 */
export class EntryCollection {
  private entries: CollectionEntry[] = [];

  constructor(public readonly name: string) {}

  /**
   * Appends entries in order. Every entry is checked before any is stored.
   * @throws DuplicateKeyError if an id is already present or repeated in the batch
   */
  add(entries: CollectionEntry[]): void {
    const seen = new Set<EntryId>(this.entries.map(entry => entry.id));
    for (const entry of entries) {
      if (seen.has(entry.id)) {
        throw new DuplicateKeyError(this.name, entry.id);
      }
      seen.add(entry.id);
    }
    this.entries.push(...entries.map(entry => structuredClone(entry)));
  }

  list(): CollectionEntry[] {
    return structuredClone(this.entries);
  }

  /**
   * @returns true if an entry was removed
   */
  remove(id: EntryId): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter(entry => entry.id !== id);
    return this.entries.length !== before;
  }

  get size(): number {
    return this.entries.length;
  }
}
