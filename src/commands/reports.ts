/**
 * Read-only listings and statistics.
 */

import { MSG_LIBRARY_EMPTY } from '../db/library.js';
import { formatRecords } from '../db/record.js';
import type { CommandContext } from './types.js';

export async function printLibrary({ session }: CommandContext): Promise<string> {
    return session.library.toString();
}

export async function printCatalog({ session }: CommandContext): Promise<string> {
    return session.catalog.toString();
}

export async function printAllocations({ session }: CommandContext): Promise<string> {
    return [
        'Memory allocations:',
        `Records: ${session.library.size}`,
        `Collections: ${session.catalog.size}`,
    ].join('\n');
}

export async function findString({ session, input }: CommandContext): Promise<string> {
    const substr = await input.readWord();
    return formatRecords(session.library.findString(substr));
}

export async function listRatings({ session }: CommandContext): Promise<string> {
    const records = session.library.listRatings();
    return records.length === 0 ? MSG_LIBRARY_EMPTY : formatRecords(records);
}

export async function collectionStatistics({ session }: CommandContext): Promise<string> {
    const { inAtLeastOne, inMoreThanOne, totalMemberships } = session.catalog.collectionStatistics();
    const numRecords = session.library.size;
    return [
        `${inAtLeastOne} out of ${numRecords} Records appear in at least one Collection`,
        `${inMoreThanOne} out of ${numRecords} Records appear in more than one Collection`,
        `Collections contain a total of ${totalMemberships} Records`,
    ].join('\n');
}
