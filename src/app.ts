import type { AppConfig } from './config.js';
import { TextFileStore } from './db/textfile.js';
import { isMediaCatalogError } from './errors.js';
import { Session } from './session.js';

/** Build the session for a run, restoring the configured snapshot if there is one. */
export function createSession(config: AppConfig): Session {
    const session = new Session(new TextFileStore(config.dataDir));
    if (!config.restoreFile) return session;

    try {
        session.restoreAll(config.restoreFile);
        if (!config.quiet) {
            console.log(`✅ Restored ${session.library.size} records and ${session.catalog.size} collections from ${config.restoreFile}`);
        }
    } catch (err) {
        if (!isMediaCatalogError(err)) throw err;
        if (!config.quiet) console.warn(`⚠️ Could not restore ${config.restoreFile}: ${err.message}`);
    }
    return session;
}
