import { InvalidFormatError, InvalidValueError, OutOfRangeError } from '../errors.js';
import { parseInteger, type SnapshotWriter } from './format.js';

export const MIN_RATING = 1;
export const MAX_RATING = 5;
/** Rating stored for records nobody has rated yet. */
export const UNRATED = 0;

const RECORD_LINE_RE = /^[ \t]*(\S+)[ \t]+(\S+)[ \t]+(\S+)[ \t]+(.*)$/;

/** Collapse runs of whitespace to single spaces and trim the ends. */
export function normalizeTitle(raw: string): string {
    return raw.split(/\s+/).filter((w) => w.length > 0).join(' ');
}

const SINGLE_WORD_RE = /^\S+$/;

/** Normalize a title for storage; an all-whitespace title is refused. */
export function requireTitle(raw: string): string {
    const title = normalizeTitle(raw);
    if (title.length === 0) throw new InvalidValueError('Title must not be empty!');
    return title;
}

/** Mediums and collection names are stored as one whitespace-free field. */
export function requireWord(value: string, what: string): string {
    if (!SINGLE_WORD_RE.test(value)) throw new InvalidValueError(`${what} must be a single word!`);
    return value;
}

/**
 * MediaRecord: a single cataloged media item.
 *
 * The id never changes. The title is only changed through Library.modifyTitle so the
 * title index stays in step, and membershipCount is only touched by Collection.
 */
export class MediaRecord {
    readonly id: number;
    readonly medium: string;
    private currentTitle: string;
    private currentRating: number;
    private memberships = 0;

    constructor(id: number, medium: string, title: string, rating: number = UNRATED) {
        this.id = id;
        this.medium = medium;
        this.currentTitle = title;
        this.currentRating = rating;
    }

    get title(): string {
        return this.currentTitle;
    }

    get rating(): number {
        return this.currentRating;
    }

    get isRated(): boolean {
        return this.currentRating !== UNRATED;
    }

    /** Number of collections that currently contain this record. */
    get membershipCount(): number {
        return this.memberships;
    }

    setRating(rating: number): void {
        if (!Number.isInteger(rating) || rating < MIN_RATING || rating > MAX_RATING) {
            throw new OutOfRangeError('Rating is out of range!', 'discard-line');
        }
        this.currentRating = rating;
    }

    /** @internal Library.modifyTitle re-keys its index around this call. */
    retitle(title: string): void {
        this.currentTitle = title;
    }

    /** @internal */
    joinedCollection(): void {
        this.memberships++;
    }

    /** @internal */
    leftCollection(): void {
        this.memberships--;
    }

    save(writer: SnapshotWriter): void {
        writer.line(`${this.id} ${this.medium} ${this.currentRating} ${this.currentTitle}`);
    }

    /** Parse one `<id> <medium> <rating> <title>` line. */
    static restore(line: string): MediaRecord {
        const match = RECORD_LINE_RE.exec(line);
        if (!match) throw new InvalidFormatError();
        const [, idToken, medium, ratingToken, title] = match;

        const id = parseInteger(idToken);
        if (id === undefined || id < 1) throw new InvalidFormatError();

        const rating = parseInteger(ratingToken);
        if (rating === undefined || rating < UNRATED || rating > MAX_RATING) throw new InvalidFormatError();

        if (title.length === 0 || normalizeTitle(title) !== title) throw new InvalidFormatError();

        return new MediaRecord(id, medium, title, rating);
    }

    toString(): string {
        const rating = this.isRated ? String(this.currentRating) : 'u';
        return `${this.id}: ${this.medium} ${rating} ${this.currentTitle}`;
    }
}

/** Plain ascending string order, used for titles and collection names. */
export function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function sortByTitle(records: Iterable<MediaRecord>): MediaRecord[] {
    return [...records].sort((a, b) => compareText(a.title, b.title));
}

/** One record per line; empty string for none. */
export function formatRecords(records: readonly MediaRecord[]): string {
    return records.map((r) => r.toString()).join('\n');
}
