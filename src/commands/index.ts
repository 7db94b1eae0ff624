/**
 * Command registry.
 * Maps each two-character code typed at the prompt to its handler.
 * To add a command, write the handler in one of the sibling files and register it here.
 */

import {
    addCollection, addMember, combineCollections, deleteCollection, deleteMember, printCollection,
} from './collections.js';
import {
    addRecord, deleteRecord, findRecord, modifyRating, modifyTitle, printRecord,
} from './records.js';
import {
    collectionStatistics, findString, listRatings, printAllocations, printCatalog, printLibrary,
} from './reports.js';
import { clearAll, clearCatalog, clearLibrary, restoreAll, saveAll } from './storage.js';
import type { Command } from './types.js';

export type { Command, CommandContext } from './types.js';

/** Typed at the prompt to leave the shell */
export const QUIT_COMMAND = 'qq';

const commands = new Map<string, Command>([
    ['fr', findRecord],
    ['pr', printRecord],
    ['pc', printCollection],
    ['pL', printLibrary],
    ['pC', printCatalog],
    ['pa', printAllocations],
    ['ar', addRecord],
    ['ac', addCollection],
    ['am', addMember],
    ['mr', modifyRating],
    ['mt', modifyTitle],
    ['dr', deleteRecord],
    ['dc', deleteCollection],
    ['dm', deleteMember],
    ['cL', clearLibrary],
    ['cC', clearCatalog],
    ['cA', clearAll],
    ['sA', saveAll],
    ['rA', restoreAll],
    ['fs', findString],
    ['lr', listRatings],
    ['cs', collectionStatistics],
    ['cc', combineCollections],
]);

export function getCommand(code: string): Command | undefined {
    return commands.get(code);
}

export function getCommandCodes(): string[] {
    return [...commands.keys()];
}
