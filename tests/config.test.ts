/**
 * Configuration and startup Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createSession } from '../src/app.js';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dataDir: process.cwd(), restoreFile: null, quiet: false });
  });

  it('reads the environment', () => {
    const config = loadConfig({ MEDIA_DATA_DIR: '/srv/media', MEDIA_RESTORE_FILE: 'catalog.txt', MEDIA_QUIET: 'yes' });
    expect(config).toEqual({ dataDir: '/srv/media', restoreFile: 'catalog.txt', quiet: true });
  });

  it('lets flags override the environment', () => {
    const config = loadConfig(
      { MEDIA_DATA_DIR: '/srv/media', MEDIA_RESTORE_FILE: 'catalog.txt', MEDIA_QUIET: '1' },
      { dataDir: '/tmp/other', restore: 'other.txt', quiet: false },
    );
    expect(config).toEqual({ dataDir: '/tmp/other', restoreFile: 'other.txt', quiet: false });
  });

  it('treats unknown quiet values as off', () => {
    expect(loadConfig({ MEDIA_QUIET: 'maybe' }).quiet).toBe(false);
  });
});

describe('createSession', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-catalog-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('starts empty without a restore file', () => {
    const session = createSession({ dataDir: dir, restoreFile: null, quiet: true });
    expect(session.library.size).toBe(0);
    expect(session.catalog.size).toBe(0);
  });

  it('restores the configured snapshot and logs a summary', () => {
    fs.writeFileSync(path.join(dir, 'start.txt'), '1\n1 DVD 3 Heat\n1\nfav 1\nHeat\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const session = createSession({ dataDir: dir, restoreFile: 'start.txt', quiet: false });

    expect(session.library.findRecordById(1).title).toBe('Heat');
    expect(session.catalog.findCollection('fav').size).toBe(1);
    expect(log).toHaveBeenCalledWith('✅ Restored 1 records and 1 collections from start.txt');
  });

  it('warns and starts empty when the snapshot cannot be restored', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const session = createSession({ dataDir: dir, restoreFile: 'missing.txt', quiet: false });

    expect(session.library.size).toBe(0);
    expect(warn).toHaveBeenCalledWith('⚠️ Could not restore missing.txt: Could not open file!');
  });

  it('stays silent about a failed restore when quiet', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const session = createSession({ dataDir: dir, restoreFile: 'missing.txt', quiet: true });

    expect(session.library.size).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });
});
