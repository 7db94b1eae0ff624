/**
 * Tokenizer for the interactive shell.
 * Reads command codes, words, integers and titles from a stream of input lines.
 * Words and integers may start on a later line; titles always take the rest of
 * the current line.
 */

import { InputError } from '../errors.js';
import { parseInteger } from '../db/format.js';
import { normalizeTitle } from '../db/record.js';

/** Resolves to the next input line (without its newline), or undefined at end of input. */
export type LineSource = () => Promise<string | undefined>;

const COMMAND_LENGTH = 2;
const WHITESPACE_RE = /\s/;
const DIGIT_RE = /[0-9]/;

export const ERR_UNREADABLE_INTEGER = 'Could not read an integer value!';
export const ERR_UNREADABLE_TITLE = 'Could not read a title!';

/** LineSource over a fixed list of lines */
export function linesFrom(lines: readonly string[]): LineSource {
    let i = 0;
    return async () => (i < lines.length ? lines[i++] : undefined);
}

/** LineSource over any async iterator of lines, such as a readline interface */
export function linesFromIterator(iterator: AsyncIterator<string>): LineSource {
    return async () => {
        const next = await iterator.next();
        return next.done ? undefined : next.value;
    };
}

export class TokenReader {
    private buffer = '';
    private pos = 0;
    private ended = false;
    private readonly nextLine: LineSource;

    constructor(nextLine: LineSource) {
        this.nextLine = nextLine;
    }

    /** Two non-whitespace characters, or undefined once input runs out. */
    async readCommand(): Promise<string | undefined> {
        let code = '';
        for (let i = 0; i < COMMAND_LENGTH; i++) {
            await this.skipWhitespace();
            const ch = await this.peek();
            if (ch === undefined) return undefined;
            code += this.take();
        }
        return code;
    }

    async readWord(): Promise<string> {
        await this.skipWhitespace();
        let word = '';
        for (let ch = await this.peek(); ch !== undefined && !WHITESPACE_RE.test(ch); ch = await this.peek()) {
            word += this.take();
        }
        if (word.length === 0) throw new InputError('Unexpected end of input!', 'keep-line');
        return word;
    }

    /** An optional sign followed by decimal digits. */
    async readInt(): Promise<number> {
        await this.skipWhitespace();
        const first = await this.peek();
        if (first === undefined) throw new InputError(ERR_UNREADABLE_INTEGER, 'discard-line');

        let token = this.take();
        if (token !== '+' && token !== '-' && !DIGIT_RE.test(token)) {
            throw new InputError(ERR_UNREADABLE_INTEGER, 'discard-line');
        }
        for (let ch = await this.peek(); ch !== undefined && DIGIT_RE.test(ch); ch = await this.peek()) {
            token += this.take();
        }

        const value = parseInteger(token);
        if (value === undefined) throw new InputError(ERR_UNREADABLE_INTEGER, 'discard-line');
        return value;
    }

    /** The rest of the current line, consuming its newline. */
    async readLine(): Promise<string> {
        let line = '';
        for (;;) {
            const newline = this.buffer.indexOf('\n', this.pos);
            if (newline >= 0) {
                line += this.buffer.slice(this.pos, newline);
                this.pos = newline + 1;
                return line;
            }
            line += this.buffer.slice(this.pos);
            this.pos = this.buffer.length;
            if (!(await this.fill())) return line;
        }
    }

    /** The rest of the current line with whitespace runs collapsed. */
    async readTitle(): Promise<string> {
        const title = normalizeTitle(await this.readLine());
        if (title.length === 0) throw new InputError(ERR_UNREADABLE_TITLE, 'keep-line');
        return title;
    }

    async skipWhitespace(): Promise<void> {
        for (let ch = await this.peek(); ch !== undefined && WHITESPACE_RE.test(ch); ch = await this.peek()) {
            this.take();
        }
    }

    private async peek(): Promise<string | undefined> {
        while (this.pos >= this.buffer.length) {
            if (!(await this.fill())) return undefined;
        }
        return this.buffer[this.pos];
    }

    private take(): string {
        return this.buffer[this.pos++];
    }

    private async fill(): Promise<boolean> {
        if (this.ended) return false;
        const line = await this.nextLine();
        if (line === undefined) {
            this.ended = true;
            return false;
        }
        this.buffer = this.buffer.slice(this.pos) + line + '\n';
        this.pos = 0;
        return true;
    }
}
