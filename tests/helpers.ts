import type { Catalog } from '../src/db/catalog.js';
import type { Library } from '../src/db/library.js';
import type { MediaRecord } from '../src/db/record.js';

/** Run fn and hand back whatever it threw */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

/** Membership count recomputed from the catalog, for checking the cached one */
export function countMemberships(catalog: Catalog, record: MediaRecord): number {
  return catalog.collections().filter((c) => c.hasMember(record)).length;
}

export function expectCountsConsistent(library: Library, catalog: Catalog): void {
  for (const record of library.records()) {
    if (record.membershipCount !== countMemberships(catalog, record)) {
      throw new Error(`membershipCount of "${record.title}" is ${record.membershipCount}, expected ${countMemberships(catalog, record)}`);
    }
  }
}
