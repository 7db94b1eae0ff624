import { Catalog } from './db/catalog.js';
import type { SnapshotStore } from './db/db.js';
import { Library } from './db/library.js';

/**
 * Session: the one Library/Catalog pair of a run, plus where snapshots go.
 * Created at startup and handed to every command; there is no module-level state.
 */
export class Session {
    private currentLibrary = new Library();
    private currentCatalog = new Catalog();
    readonly store: SnapshotStore;

    constructor(store: SnapshotStore) {
        this.store = store;
    }

    get library(): Library {
        return this.currentLibrary;
    }

    get catalog(): Catalog {
        return this.currentCatalog;
    }

    saveAll(name: string): void {
        this.store.save(name, { library: this.currentLibrary, catalog: this.currentCatalog });
    }

    /** Replace the session's data with a stored snapshot. On failure the current data stays. */
    restoreAll(name: string): void {
        const { library, catalog } = this.store.load(name);
        this.currentLibrary = library;
        this.currentCatalog = catalog;
    }

    clearAll(): void {
        this.currentLibrary.clearAll(this.currentCatalog);
    }
}
