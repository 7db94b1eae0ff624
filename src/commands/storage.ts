/**
 * Bulk clearing plus save/restore of the whole session.
 */

import type { CommandContext } from './types.js';

export const MSG_ALL_DATA_DELETED = 'All data deleted';

export async function clearLibrary({ session }: CommandContext): Promise<string> {
    session.library.clear(session.catalog);
    return 'All records deleted';
}

export async function clearCatalog({ session }: CommandContext): Promise<string> {
    session.catalog.clear();
    return 'All collections deleted';
}

export async function clearAll({ session }: CommandContext): Promise<string> {
    session.clearAll();
    return MSG_ALL_DATA_DELETED;
}

export async function saveAll({ session, input }: CommandContext): Promise<string> {
    const filename = await input.readWord();
    session.saveAll(filename);
    return 'Data saved';
}

export async function restoreAll({ session, input }: CommandContext): Promise<string> {
    const filename = await input.readWord();
    session.restoreAll(filename);
    return 'Data loaded';
}
