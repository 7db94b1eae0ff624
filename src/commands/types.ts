import type { TokenReader } from '../input/tokens.js';
import type { Session } from '../session.js';

export interface CommandContext {
    session: Session;
    input: TokenReader;
}

/** Reads its own arguments, performs the operation and returns the text to print. */
export type Command = (ctx: CommandContext) => Promise<string>;
