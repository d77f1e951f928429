import type { SpecDefinition, SpecEntry, SpecKind } from '../domain/index.js';

/**
 * In-memory spec cache keyed by spec name.
 *
 * Writes are insert/overwrite only: a spec missing from a newer sync document
 * stays in the cache. The key is the name alone, so a config that reuses a
 * gate's name replaces the gate entry (kind and definition both).
 *
 * `replaceAll()` builds the next map aside and swaps it in, so `lookup()`
 * always reads a complete snapshot: the previous one or the next one.
 */
export class SpecStore {
  private entries: ReadonlyMap<string, SpecEntry>;

  constructor() {
    this.entries = new Map();
  }

  /**
   * Upserts every entry that carries a non-empty string `name`.
   * Entries without one are skipped silently.
   *
   * @returns How many entries were stored.
   */
  replaceAll(kind: SpecKind, definitions: readonly SpecDefinition[]): number {
    const next = new Map(this.entries);
    let stored = 0;

    for (const definition of definitions) {
      const name = definition['name'];
      if (typeof name !== 'string' || name === '') continue;

      next.set(name, { name, kind, definition });
      stored++;
    }

    this.entries = next;
    return stored;
  }

  lookup(name: string): SpecEntry | undefined {
    return this.entries.get(name);
  }

  get size(): number {
    return this.entries.size;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}
