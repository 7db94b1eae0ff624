import { getCommand, QUIT_COMMAND } from './commands/index.js';
import { MSG_ALL_DATA_DELETED } from './commands/storage.js';
import { isMediaCatalogError } from './errors.js';
import type { TokenReader } from './input/tokens.js';
import type { Session } from './session.js';

export const PROMPT = '\nEnter command: ';

export interface ShellOptions {
    session: Session;
    input: TokenReader;
    /** Receives everything the shell prints, newlines included */
    write: (text: string) => void;
}

/**
 * Prompt-and-dispatch loop.
 * Runs until `qq` or end of input, then clears all data before returning.
 * Catalog errors are printed and the loop continues; anything else propagates.
 */
export async function runShell({ session, input, write }: ShellOptions): Promise<void> {
    const println = (text: string) => write(`${text}\n`);

    for (;;) {
        write(PROMPT);
        const code = await input.readCommand();
        if (code === undefined) {
            write('\n');
            break;
        }
        if (code === QUIT_COMMAND) break;

        const command = getCommand(code);
        if (!command) {
            println('Unrecognized command!');
            await input.readLine();
            continue;
        }

        try {
            println(await command({ session, input }));
        } catch (err) {
            if (!isMediaCatalogError(err)) throw err;
            if (err.discardsLine) await input.readLine();
            println(err.message);
        }
    }

    session.clearAll();
    println(MSG_ALL_DATA_DELETED);
    println('Done');
}
