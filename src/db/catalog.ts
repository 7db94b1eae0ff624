import { DuplicateError, InvalidFormatError, NotFoundError } from '../errors.js';
import { Collection } from './collection.js';
import type { SnapshotReader, SnapshotWriter } from './format.js';
import type { Library } from './library.js';
import { compareText, requireWord } from './record.js';

const ERR_NO_SUCH_COLLECTION = 'No collection with that name!';
const ERR_DUPLICATE_COLLECTION = 'Catalog already has a collection with this name!';

export interface CollectionStatistics {
    /** Distinct records in at least one collection */
    inAtLeastOne: number;
    /** Distinct records in two or more collections */
    inMoreThanOne: number;
    /** Sum of all collection sizes */
    totalMemberships: number;
}

/** Catalog: the named collections of a session. */
export class Catalog {
    private readonly byName = new Map<string, Collection>();

    get size(): number {
        return this.byName.size;
    }

    /** True when any collection has at least one member */
    hasMemberships(): boolean {
        for (const collection of this.byName.values()) {
            if (collection.size > 0) return true;
        }
        return false;
    }

    addCollection(name: string): Collection {
        requireWord(name, 'Collection name');
        if (this.byName.has(name)) throw new DuplicateError(ERR_DUPLICATE_COLLECTION, 'discard-line');
        const collection = new Collection(name);
        this.byName.set(name, collection);
        return collection;
    }

    findCollection(name: string): Collection {
        const collection = this.byName.get(name);
        if (!collection) throw new NotFoundError(ERR_NO_SUCH_COLLECTION, 'discard-line');
        return collection;
    }

    /** Release the collection's members, then drop it. */
    deleteCollection(name: string): void {
        const collection = this.findCollection(name);
        collection.clear();
        this.byName.delete(name);
    }

    clear(): void {
        for (const collection of this.byName.values()) collection.clear();
        this.byName.clear();
    }

    collectionStatistics(): CollectionStatistics {
        // record id -> number of collections holding it
        const occurrences = new Map<number, number>();
        let totalMemberships = 0;

        for (const collection of this.byName.values()) {
            totalMemberships += collection.size;
            for (const record of collection.members()) {
                occurrences.set(record.id, (occurrences.get(record.id) ?? 0) + 1);
            }
        }

        let inMoreThanOne = 0;
        for (const count of occurrences.values()) {
            if (count > 1) inMoreThanOne++;
        }

        return { inAtLeastOne: occurrences.size, inMoreThanOne, totalMemberships };
    }

    /**
     * Create `dstName` holding the union of two existing collections.
     * A record found in both sources is added once. The sources are left as they were.
     */
    combineCollections(firstName: string, secondName: string, dstName: string): Collection {
        const first = this.findCollection(firstName);
        const second = this.findCollection(secondName);
        if (this.byName.has(dstName)) throw new DuplicateError(ERR_DUPLICATE_COLLECTION, 'discard-line');

        const dst = this.addCollection(dstName);
        for (const record of [...first.members(), ...second.members()]) {
            if (!dst.hasMember(record)) dst.addMember(record);
        }
        return dst;
    }

    /** Collections ascending by name */
    collections(): Collection[] {
        return [...this.byName.values()].sort((a, b) => compareText(a.name, b.name));
    }

    save(writer: SnapshotWriter): void {
        writer.count(this.byName.size);
        for (const collection of this.collections()) collection.save(writer);
    }

    static restore(reader: SnapshotReader, library: Library): Catalog {
        const catalog = new Catalog();
        const count = reader.readCount();

        for (let i = 0; i < count; i++) {
            const collection = Collection.restore(reader, library);
            if (catalog.byName.has(collection.name)) throw new InvalidFormatError();
            catalog.byName.set(collection.name, collection);
        }

        return catalog;
    }

    toString(): string {
        if (this.byName.size === 0) return 'Catalog is empty';
        const blocks = this.collections().map((c) => c.toString());
        return [`Catalog contains ${this.byName.size} collections:`, ...blocks].join('\n');
    }
}
