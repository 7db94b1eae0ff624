import { Catalog } from './catalog.js';
import { SnapshotReader, SnapshotWriter } from './format.js';
import { Library } from './library.js';

/** A Library together with the Catalog whose collections point into it. */
export interface Snapshot {
    library: Library;
    catalog: Catalog;
}

/**
 * SnapshotStore: abstract persistence for a whole session.
 * Implement this for any backend that can hold the text snapshot.
 */
export interface SnapshotStore {
    /** Write the library and catalog under `name`. */
    save(name: string, snapshot: Snapshot): void;

    /** Read a complete snapshot back. Nothing is returned unless all of it parses. */
    load(name: string): Snapshot;
}

/** Serialize library then catalog, records and collections in ascending order. */
export function encodeSnapshot({ library, catalog }: Snapshot): string {
    const writer = new SnapshotWriter();
    library.save(writer);
    catalog.save(writer);
    return writer.toString();
}

/** Parse snapshot text into a fresh Library and Catalog; throws InvalidFormatError on any defect. */
export function decodeSnapshot(text: string): Snapshot {
    const reader = new SnapshotReader(text);
    const library = Library.restore(reader);
    const catalog = Catalog.restore(reader, library);
    reader.expectEnd();
    return { library, catalog };
}
