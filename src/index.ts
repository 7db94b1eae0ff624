#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import readline from 'readline';
import { createSession } from './app.js';
import { getCommandCodes } from './commands/index.js';
import { loadConfig, type ConfigOverrides } from './config.js';
import { linesFromIterator, TokenReader } from './input/tokens.js';
import { runShell } from './shell.js';

async function main(options: ConfigOverrides): Promise<void> {
    const config = loadConfig(process.env, options);
    const session = createSession(config);

    const rl = readline.createInterface({ input: process.stdin, terminal: false });
    try {
        await runShell({
            session,
            input: new TokenReader(linesFromIterator(rl[Symbol.asyncIterator]())),
            write: (text) => process.stdout.write(text),
        });
    } finally {
        rl.close();
    }
}

const program = new Command();

program
    .name('media-catalog')
    .description('Interactive manager for a catalog of rated media records and named collections')
    .version('1.0.0')
    .option('-d, --data-dir <dir>', 'directory that save/restore file names resolve against')
    .option('-r, --restore <file>', 'restore a saved snapshot before the first prompt')
    .option('-q, --quiet', 'suppress diagnostic messages')
    .addHelpText('after', `\nCommands at the prompt: ${getCommandCodes().join(' ')} qq`)
    .action(async (options: ConfigOverrides) => {
        await main(options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
});
