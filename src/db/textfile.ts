import fs from 'fs';
import path from 'path';
import { IOError } from '../errors.js';
import { decodeSnapshot, encodeSnapshot, type Snapshot, type SnapshotStore } from './db.js';

const ERR_UNOPENABLE_FILE = 'Could not open file!';
const ERR_UNWRITABLE_FILE = 'Could not write file!';

function closeFile(fd: number): void {
    try {
        fs.closeSync(fd);
    } catch (err) {
        throw new IOError(ERR_UNWRITABLE_FILE, err);
    }
}

/**
 * Plain-text implementation of SnapshotStore.
 * Relative names resolve against the configured data directory.
 */
export class TextFileStore implements SnapshotStore {
    private readonly dataDir: string;

    constructor(dataDir: string = process.cwd()) {
        this.dataDir = dataDir;
    }

    resolve(name: string): string {
        return path.resolve(this.dataDir, name);
    }

    save(name: string, snapshot: Snapshot): void {
        const text = encodeSnapshot(snapshot);

        let fd: number;
        try {
            fd = fs.openSync(this.resolve(name), 'w');
        } catch (err) {
            throw new IOError(ERR_UNOPENABLE_FILE, err);
        }

        try {
            fs.writeFileSync(fd, text, 'utf8');
        } catch (err) {
            throw new IOError(ERR_UNWRITABLE_FILE, err);
        } finally {
            closeFile(fd);
        }
    }

    load(name: string): Snapshot {
        let text: string;
        try {
            text = fs.readFileSync(this.resolve(name), 'utf8');
        } catch (err) {
            throw new IOError(ERR_UNOPENABLE_FILE, err);
        }
        return decodeSnapshot(text);
    }
}
