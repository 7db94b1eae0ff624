/**
 * Collection commands: print, add, delete, membership and combine.
 */

import type { Collection } from '../db/collection.js';
import { readRecordById } from './records.js';
import type { CommandContext } from './types.js';

async function readCollection({ session, input }: CommandContext): Promise<Collection> {
    const name = await input.readWord();
    return session.catalog.findCollection(name);
}

export async function printCollection(ctx: CommandContext): Promise<string> {
    const collection = await readCollection(ctx);
    return collection.toString();
}

export async function addCollection({ session, input }: CommandContext): Promise<string> {
    const name = await input.readWord();
    session.catalog.addCollection(name);
    return `Collection ${name} added`;
}

export async function deleteCollection({ session, input }: CommandContext): Promise<string> {
    const name = await input.readWord();
    session.catalog.deleteCollection(name);
    return `Collection ${name} deleted`;
}

export async function addMember(ctx: CommandContext): Promise<string> {
    const collection = await readCollection(ctx);
    const record = await readRecordById(ctx);
    collection.addMember(record);
    return `Member ${record.id} ${record.title} added`;
}

export async function deleteMember(ctx: CommandContext): Promise<string> {
    const collection = await readCollection(ctx);
    const record = await readRecordById(ctx);
    collection.deleteMember(record);
    return `Member ${record.id} ${record.title} deleted`;
}

export async function combineCollections({ session, input }: CommandContext): Promise<string> {
    // each source is resolved before the next name is read
    const first = session.catalog.findCollection(await input.readWord());
    const second = session.catalog.findCollection(await input.readWord());
    const dstName = await input.readWord();
    session.catalog.combineCollections(first.name, second.name, dstName);
    return `Collections ${first.name} and ${second.name} combined into new collection ${dstName}`;
}
