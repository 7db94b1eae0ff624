/**
 * Snapshot codec Tests
 */

import { describe, it, expect } from 'vitest';
import { Catalog } from '../src/db/catalog.js';
import { decodeSnapshot, encodeSnapshot } from '../src/db/db.js';
import { SnapshotReader } from '../src/db/format.js';
import { Library } from '../src/db/library.js';
import { InvalidFormatError } from '../src/errors.js';
import { expectCountsConsistent, thrownBy } from './helpers.js';

function populated(): { library: Library; catalog: Catalog } {
  const library = new Library();
  const catalog = new Catalog();
  library.addRecord('DVD', 'The Matrix');
  library.addRecord('VHS', 'Alien');
  library.addRecord('CD', 'Kind of Blue');
  library.addRecord('DVD', 'Gone');
  library.deleteRecord('Gone');
  library.findRecordByTitle('Alien').setRating(4);
  library.findRecordByTitle('Kind of Blue').setRating(5);

  const scifi = catalog.addCollection('scifi');
  scifi.addMember(library.findRecordById(1));
  scifi.addMember(library.findRecordById(2));
  catalog.addCollection('empty');
  catalog.addCollection('best').addMember(library.findRecordById(3));
  return { library, catalog };
}

const POPULATED_TEXT = [
  '3',
  '2 VHS 4 Alien',
  '3 CD 5 Kind of Blue',
  '1 DVD 0 The Matrix',
  '3',
  'best 1',
  'Kind of Blue',
  'empty 0',
  'scifi 2',
  'Alien',
  'The Matrix',
  '',
].join('\n');

describe('encodeSnapshot', () => {
  it('writes records by title and collections by name', () => {
    expect(encodeSnapshot(populated())).toBe(POPULATED_TEXT);
  });

  it('writes two zero counts for an empty session', () => {
    expect(encodeSnapshot({ library: new Library(), catalog: new Catalog() })).toBe('0\n0\n');
  });
});

describe('decodeSnapshot', () => {
  it('restores records, ratings, collections and membership counts', () => {
    const { library, catalog } = decodeSnapshot(POPULATED_TEXT);

    expect(library.records().map((r) => r.toString())).toEqual([
      '2: VHS 4 Alien',
      '3: CD 5 Kind of Blue',
      '1: DVD u The Matrix',
    ]);
    expect(catalog.collections().map((c) => c.name)).toEqual(['best', 'empty', 'scifi']);
    expect(catalog.findCollection('scifi').members().map((r) => r.id)).toEqual([2, 1]);
    expect(library.findRecordById(2).membershipCount).toBe(1);
    expect(library.findRecordById(3).membershipCount).toBe(1);
    expectCountsConsistent(library, catalog);
  });

  it('continues ids after the highest restored id', () => {
    const { library } = decodeSnapshot(POPULATED_TEXT);
    expect(library.nextId).toBe(4);
    expect(library.addRecord('DVD', 'Heat')).toBe(4);
  });

  it('starts ids at 1 for an empty snapshot', () => {
    expect(decodeSnapshot('0\n0\n').library.nextId).toBe(1);
  });

  it('round-trips a saved session', () => {
    const original = populated();
    const text = encodeSnapshot(original);
    const restored = decodeSnapshot(text);
    expect(encodeSnapshot(restored)).toBe(text);
    expect(restored.library.nextId).toBe(4);
    expect(restored.catalog.collectionStatistics()).toEqual(original.catalog.collectionStatistics());
  });

  it('accepts a file without a final newline', () => {
    expect(decodeSnapshot('1\n5 DVD 2 Heat\n0').library.findRecordById(5).rating).toBe(2);
  });

  it.each([
    ['a negative record count', '-1\n0\n'],
    ['a non-numeric record count', 'many\n0\n'],
    ['a rating of 6', '1\n1 DVD 6 Heat\n0\n'],
    ['an id of 0', '1\n0 DVD 3 Heat\n0\n'],
    ['a duplicate id', '2\n1 DVD 3 Heat\n1 VHS 2 Alien\n0\n'],
    ['a duplicate title', '2\n1 DVD 3 Heat\n2 VHS 2 Heat\n0\n'],
    ['fewer record lines than counted', '2\n1 DVD 3 Heat\n'],
    ['a missing catalog section', '1\n1 DVD 3 Heat\n'],
    ['a negative collection count', '0\n-1\n'],
    ['a negative member count', '1\n1 DVD 3 Heat\n1\nfav -1\n'],
    ['a malformed collection header', '1\n1 DVD 3 Heat\n1\nfav\n'],
    ['an unknown member title', '1\n1 DVD 3 Heat\n1\nfav 1\nAlien\n'],
    ['a member listed twice', '1\n1 DVD 3 Heat\n1\nfav 2\nHeat\nHeat\n'],
    ['a duplicate collection name', '1\n1 DVD 3 Heat\n2\nfav 0\nfav 0\n'],
    ['trailing content', '0\n0\nextra\n'],
    ['an empty file', ''],
  ])('rejects %s', (_label, text) => {
    const err = thrownBy(() => decodeSnapshot(text));
    expect(err).toBeInstanceOf(InvalidFormatError);
    expect(err).toMatchObject({ message: 'Invalid data found in file!', recovery: 'discard-line' });
  });

  it('ignores blank lines after the last block', () => {
    expect(decodeSnapshot('0\n0\n\n\n').catalog.size).toBe(0);
  });
});

describe('SnapshotReader', () => {
  it('reads counts and lines in order', () => {
    const reader = new SnapshotReader('2\nfirst\n');
    expect(reader.readCount()).toBe(2);
    expect(reader.nextLine()).toBe('first');
    expect(() => reader.nextLine()).toThrow(InvalidFormatError);
  });
});
