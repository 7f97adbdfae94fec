import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ShowConfReader } from '../reader/ShowConfReader';
import { makeTempDir, removeDir, writeTextFile } from './fixtures';

describe('ShowConfReader', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads every recognised key', () => {
    const confFile = writeTextFile(
      dir,
      'conf.yml',
      ['dir: /srv/snds', 'limit: 0', 'columns:', '  - IP', '  - " Traffic "', 'wishlist: [Date, SRD]', 'other: 1', ''].join('\n')
    );
    const conf = ShowConfReader.readConfFile(confFile);
    expect(conf.dir).toBe('/srv/snds');
    expect(conf.limit).toBe(0);
    expect(conf.columns).toEqual(['IP', 'Traffic']);
    expect(conf.wishlist).toEqual(['Date', 'SRD']);
  });

  it('accepts a comma-separated column string', () => {
    expect(ShowConfReader.parseConf({ columns: 'IP, ,Traffic' }).columns).toEqual(['IP', 'Traffic']);
  });

  it('treats an empty document as no configuration', () => {
    const conf = ShowConfReader.readConfFile(writeTextFile(dir, 'empty.yml', ''));
    expect(conf.dir).toBeUndefined();
    expect(conf.limit).toBeUndefined();
    expect(conf.columns).toBeUndefined();
    expect(conf.wishlist).toBeUndefined();
  });

  it('names a key of the wrong type', () => {
    expect(() => ShowConfReader.parseConf({ limit: 'ten' })).toThrow('"limit" must be an integer');
    expect(() => ShowConfReader.parseConf({ wishlist: ['IP', 3] })).toThrow('"wishlist" must be a list of strings');
    expect(() => ShowConfReader.parseConf({ dir: 7 })).toThrow('"dir" must be a string');
  });

  it('rejects a document that is not a mapping', () => {
    const confFile = writeTextFile(dir, 'list.yml', '- IP\n- Traffic\n');
    expect(() => ShowConfReader.readConfFile(confFile)).toThrow(
      'Error reading or parsing configuration file: configuration must be a mapping'
    );
  });
});
