/**
 * Record commands: find, print, add, rate, retitle, delete.
 */

import type { MediaRecord } from '../db/record.js';
import type { CommandContext } from './types.js';

/** Read an id and resolve it in the library */
export async function readRecordById({ session, input }: CommandContext): Promise<MediaRecord> {
    const id = await input.readInt();
    return session.library.findRecordById(id);
}

export async function findRecord({ session, input }: CommandContext): Promise<string> {
    const title = await input.readTitle();
    return session.library.findRecordByTitle(title).toString();
}

export async function printRecord(ctx: CommandContext): Promise<string> {
    const record = await readRecordById(ctx);
    return record.toString();
}

export async function addRecord({ session, input }: CommandContext): Promise<string> {
    const medium = await input.readWord();
    const title = await input.readTitle();
    const id = session.library.addRecord(medium, title);
    return `Record ${id} added`;
}

export async function modifyRating(ctx: CommandContext): Promise<string> {
    const record = await readRecordById(ctx);
    const rating = await ctx.input.readInt();
    record.setRating(rating);
    return `Rating for record ${record.id} changed to ${rating}`;
}

export async function modifyTitle(ctx: CommandContext): Promise<string> {
    const record = await readRecordById(ctx);
    const title = await ctx.input.readTitle();
    ctx.session.library.modifyTitle(record, title);
    return `Title for record ${record.id} changed to ${title}`;
}

export async function deleteRecord({ session, input }: CommandContext): Promise<string> {
    const title = await input.readTitle();
    const record = session.library.deleteRecord(title);
    return `Record ${record.id} ${record.title} deleted`;
}
