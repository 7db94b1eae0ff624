/**
 * Line-oriented snapshot format shared by the Library, Catalog and Collection codecs.
 *
 *   <numRecords>
 *   <id> <medium> <rating> <title>      (numRecords lines)
 *   <numCollections>
 *   <collectionName> <memberCount>
 *   <memberTitle>                        (memberCount lines)
 *   ...                                  (numCollections blocks)
 */

import { InvalidFormatError } from '../errors.js';

const INTEGER_RE = /^[+-]?\d+$/;

/** Parse a signed decimal integer token. Returns undefined for anything else. */
export function parseInteger(token: string): number | undefined {
    if (!INTEGER_RE.test(token)) return undefined;
    const value = Number(token);
    return Number.isSafeInteger(value) ? value : undefined;
}

/** Collects snapshot lines; every line is written with a trailing newline. */
export class SnapshotWriter {
    private readonly lines: string[] = [];

    line(text: string): void {
        this.lines.push(text);
    }

    count(n: number): void {
        this.lines.push(String(n));
    }

    toString(): string {
        return this.lines.map((l) => `${l}\n`).join('');
    }
}

/** Sequential reader over snapshot text. Any shortfall is an InvalidFormatError. */
export class SnapshotReader {
    private readonly lines: string[];
    private pos = 0;

    constructor(text: string) {
        const lines = text.split('\n');
        // the final newline leaves one empty element behind
        if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
        this.lines = lines;
    }

    nextLine(): string {
        if (this.pos >= this.lines.length) throw new InvalidFormatError();
        const line = this.lines[this.pos];
        this.pos++;
        return line;
    }

    /** Read a line holding a single non-negative count. */
    readCount(): number {
        const n = parseInteger(this.nextLine().trim());
        if (n === undefined || n < 0) throw new InvalidFormatError();
        return n;
    }

    /** Only blank lines may follow the last block. */
    expectEnd(): void {
        while (this.pos < this.lines.length) {
            if (this.nextLine().trim() !== '') throw new InvalidFormatError();
        }
    }
}
