/**
 * Runtime configuration.
 * Values come from the environment (a .env file is loaded by the entry point);
 * command-line flags override them.
 */

export interface AppConfig {
    /** Directory that relative save/restore file names resolve against */
    dataDir: string;
    /** Snapshot to restore before the first prompt */
    restoreFile: string | null;
    /** Suppress diagnostic log lines */
    quiet: boolean;
}

export interface ConfigOverrides {
    dataDir?: string;
    restore?: string;
    quiet?: boolean;
}

const TRUTHY = new Set(['1', 'true', 'yes']);

function parseFlag(value: string | undefined): boolean {
    return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
    const {
        MEDIA_DATA_DIR,
        MEDIA_RESTORE_FILE,
        MEDIA_QUIET,
    } = env;

    return {
        dataDir: overrides.dataDir ?? (MEDIA_DATA_DIR || process.cwd()),
        restoreFile: overrides.restore ?? (MEDIA_RESTORE_FILE || null),
        quiet: overrides.quiet ?? parseFlag(MEDIA_QUIET),
    };
}
