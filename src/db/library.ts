import { DuplicateError, InUseError, InvalidFormatError, NotFoundError } from '../errors.js';
import type { Catalog } from './catalog.js';
import type { SnapshotReader, SnapshotWriter } from './format.js';
import { compareText, formatRecords, MediaRecord, requireTitle, requireWord, sortByTitle } from './record.js';

const ERR_NO_SUCH_TITLE = 'No record with that title!';
const ERR_DUPLICATE_TITLE = 'Library already has a record with this title!';

export const MSG_LIBRARY_EMPTY = 'Library is empty';

/** Escape a user-supplied string so it matches literally inside a RegExp */
function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Library: every record in the session.
 *
 * Records live in one table keyed by id; the title index maps each title to an id.
 * Renaming only re-keys the title index, so the two views cannot drift apart.
 * Ids come from a counter that only moves forward until the library is cleared.
 */
export class Library {
    private readonly byId = new Map<number, MediaRecord>();
    private readonly titleIndex = new Map<string, number>();
    private nextRecordId = 1;

    get size(): number {
        return this.byId.size;
    }

    /** Id the next added record will receive */
    get nextId(): number {
        return this.nextRecordId;
    }

    /** Add a new unrated record and return its id. The title is stored normalized. */
    addRecord(medium: string, rawTitle: string): number {
        requireWord(medium, 'Medium');
        const title = requireTitle(rawTitle);
        if (this.titleIndex.has(title)) {
            throw new DuplicateError(ERR_DUPLICATE_TITLE, 'keep-line');
        }

        const id = this.nextRecordId++;
        this.insert(new MediaRecord(id, medium, title));
        return id;
    }

    /** Title lookup that reports absence with undefined instead of throwing */
    lookupTitle(title: string): MediaRecord | undefined {
        const id = this.titleIndex.get(title);
        return id === undefined ? undefined : this.byId.get(id);
    }

    findRecordByTitle(title: string): MediaRecord {
        const record = this.lookupTitle(title);
        if (!record) throw new NotFoundError(ERR_NO_SUCH_TITLE, 'keep-line');
        return record;
    }

    findRecordById(id: number): MediaRecord {
        const record = this.byId.get(id);
        if (!record) throw new NotFoundError('No record with that ID!', 'discard-line');
        return record;
    }

    /** Remove a record that no collection refers to, returning it. */
    deleteRecord(title: string): MediaRecord {
        const record = this.lookupTitle(title);
        if (!record) throw new NotFoundError(ERR_NO_SUCH_TITLE, 'keep-line');
        if (record.membershipCount > 0) {
            throw new InUseError('Cannot delete a record that is a member of a collection!', 'keep-line');
        }

        this.titleIndex.delete(record.title);
        this.byId.delete(record.id);
        return record;
    }

    modifyTitle(record: MediaRecord, rawTitle: string): void {
        const newTitle = requireTitle(rawTitle);
        const holder = this.titleIndex.get(newTitle);
        if (holder === record.id) return;
        if (holder !== undefined) throw new DuplicateError(ERR_DUPLICATE_TITLE, 'keep-line');

        this.titleIndex.delete(record.title);
        record.retitle(newTitle);
        this.titleIndex.set(newTitle, record.id);
    }

    /** Empty the library. Refused while any collection still has members. */
    clear(catalog: Catalog): void {
        if (catalog.hasMemberships()) {
            throw new InUseError('Cannot clear all records unless all collections are empty!', 'discard-line');
        }
        this.reset();
    }

    /** Empty the catalog, then the library. */
    clearAll(catalog: Catalog): void {
        catalog.clear();
        this.reset();
    }

    /** Case-insensitive literal substring search over titles, ascending by title. */
    findString(substr: string): MediaRecord[] {
        const pattern = new RegExp(escapeRegExp(substr), 'i');
        const matches = this.records().filter((r) => pattern.test(r.title));
        if (matches.length === 0) throw new NotFoundError('No records contain that string!', 'discard-line');
        return matches;
    }

    /** Highest rating first; equal ratings by title */
    listRatings(): MediaRecord[] {
        return [...this.byId.values()].sort(
            (a, b) => b.rating - a.rating || compareText(a.title, b.title),
        );
    }

    /** All records ascending by title */
    records(): MediaRecord[] {
        return sortByTitle(this.byId.values());
    }

    save(writer: SnapshotWriter): void {
        writer.count(this.byId.size);
        for (const record of this.records()) record.save(writer);
    }

    static restore(reader: SnapshotReader): Library {
        const library = new Library();
        const count = reader.readCount();
        let maxId = 0;

        for (let i = 0; i < count; i++) {
            const record = MediaRecord.restore(reader.nextLine());
            if (library.byId.has(record.id) || library.titleIndex.has(record.title)) {
                throw new InvalidFormatError();
            }
            library.insert(record);
            maxId = Math.max(maxId, record.id);
        }

        library.nextRecordId = maxId + 1;
        return library;
    }

    toString(): string {
        if (this.byId.size === 0) return MSG_LIBRARY_EMPTY;
        return `Library contains ${this.byId.size} records:\n${formatRecords(this.records())}`;
    }

    private insert(record: MediaRecord): void {
        this.byId.set(record.id, record);
        this.titleIndex.set(record.title, record.id);
    }

    private reset(): void {
        this.byId.clear();
        this.titleIndex.clear();
        this.nextRecordId = 1;
    }
}
