import { AlreadyMemberError, InvalidFormatError, NotMemberError } from '../errors.js';
import { parseInteger, type SnapshotReader, type SnapshotWriter } from './format.js';
import type { Library } from './library.js';
import { formatRecords, sortByTitle, type MediaRecord } from './record.js';

const HEADER_RE = /^[ \t]*(\S+)[ \t]+(\S+)[ \t]*$/;

/**
 * Collection: a named set of records, keyed by record id.
 * Every insert or removal moves the record's membershipCount with it.
 */
export class Collection {
    readonly name: string;
    private readonly memberMap = new Map<number, MediaRecord>();

    constructor(name: string) {
        this.name = name;
    }

    get size(): number {
        return this.memberMap.size;
    }

    hasMember(record: MediaRecord): boolean {
        return this.memberMap.has(record.id);
    }

    addMember(record: MediaRecord): void {
        if (this.memberMap.has(record.id)) {
            throw new AlreadyMemberError('Record is already a member in the collection!', 'discard-line');
        }
        this.memberMap.set(record.id, record);
        record.joinedCollection();
    }

    deleteMember(record: MediaRecord): void {
        if (!this.memberMap.has(record.id)) {
            throw new NotMemberError('Record is not a member in the collection!', 'discard-line');
        }
        this.memberMap.delete(record.id);
        record.leftCollection();
    }

    /** Drop every member, releasing each record's membership. */
    clear(): void {
        for (const record of this.memberMap.values()) record.leftCollection();
        this.memberMap.clear();
    }

    /** Members in ascending title order */
    members(): MediaRecord[] {
        return sortByTitle(this.memberMap.values());
    }

    save(writer: SnapshotWriter): void {
        writer.line(`${this.name} ${this.memberMap.size}`);
        for (const record of this.members()) writer.line(record.title);
    }

    /** Read one `<name> <count>` block, resolving titles against a freshly restored library. */
    static restore(reader: SnapshotReader, library: Library): Collection {
        const match = HEADER_RE.exec(reader.nextLine());
        if (!match) throw new InvalidFormatError();

        const count = parseInteger(match[2]);
        if (count === undefined || count < 0) throw new InvalidFormatError();

        const collection = new Collection(match[1]);
        for (let i = 0; i < count; i++) {
            const record = library.lookupTitle(reader.nextLine());
            if (!record || collection.hasMember(record)) throw new InvalidFormatError();
            collection.addMember(record);
        }
        return collection;
    }

    toString(): string {
        const header = `Collection ${this.name} contains:`;
        if (this.memberMap.size === 0) return `${header} None`;
        return `${header}\n${formatRecords(this.members())}`;
    }
}
